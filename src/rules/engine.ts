import fs from 'fs-extra';
import { Transaction } from '../types';
import { configurationError } from '../utils/errors';

export interface Rule {
  match: string; // Regex matched against the recipient
  recipient: string; // Normalized recipient name
}

export interface RulesConfig {
  merchant_normalization: Rule[];
}

function isRule(value: unknown): value is Rule {
  return (
    typeof value === 'object' && value !== null &&
    'match' in value && typeof value.match === 'string' &&
    'recipient' in value && typeof value.recipient === 'string'
  );
}

export class RulesEngine {
  private compiled: Array<{ pattern: RegExp; recipient: string }> = [];

  constructor(rules: RulesConfig = { merchant_normalization: [] }) {
    this.use(rules);
  }

  static fromFile(rulesPath: string): RulesEngine {
    if (!fs.existsSync(rulesPath)) {
      return new RulesEngine();
    }

    const raw: unknown = fs.readJsonSync(rulesPath);
    const list = typeof raw === 'object' && raw !== null && 'merchant_normalization' in raw
      ? raw.merchant_normalization
      : undefined;

    if (!Array.isArray(list) || !list.every(isRule)) {
      throw configurationError(`${rulesPath} must contain a merchant_normalization array of { match, recipient }`);
    }

    return new RulesEngine({ merchant_normalization: list });
  }

  use(rules: RulesConfig) {
    this.compiled = rules.merchant_normalization.map(rule => {
      try {
        return { pattern: new RegExp(rule.match, 'i'), recipient: rule.recipient };
      } catch (error) {
        throw configurationError(`Invalid rule pattern "${rule.match}"`, { cause: String(error) });
      }
    });
  }

  /**
   * Later matching rules win. The transaction id is left untouched.
   */
  apply(transaction: Transaction): Transaction {
    const t = { ...transaction };

    for (const rule of this.compiled) {
      if (rule.pattern.test(transaction.recipient)) {
        t.recipient = rule.recipient;
      }
    }

    return t;
  }
}

export function createRulesTemplate(rulesPath: string): void {
  const template: RulesConfig = {
    merchant_normalization: [
      { match: '^AMAZON|AMZN', recipient: 'Amazon' },
      { match: 'SWIGGY', recipient: 'Swiggy' },
      { match: 'ZOMATO', recipient: 'Zomato' },
    ],
  };

  fs.writeJsonSync(rulesPath, template, { spaces: 2 });
}
