import { Bank, ParseOutcome, Parser, TransactionMode } from '../types';

export interface ExtractionRule {
  amount: RegExp; // named group `amount`, optionally `card`
  description: RegExp; // first capture group
  card?: RegExp; // named group `card`, when the amount pattern doesn't carry it
}

// Reversed, declined and failed alerts carry no spend
const NON_TRANSACTION = /has\s+been\s+reversed|declined|not\s+be\s+completed/i;

// Currency prefix used by Indian bank alerts
export const CURRENCY = String.raw`(?:₹|Rs\.?|INR)`;
export const AMOUNT = String.raw`(?<amount>[\d,]+(?:\.\d+)?)`;

export function parseAmount(raw: string): number {
  return parseFloat(raw.replace(/,/g, ''));
}

export function applyRule(rule: ExtractionRule, text: string): ParseOutcome {
  const amountMatch = text.match(rule.amount);
  const descriptionMatch = text.match(rule.description);

  if (amountMatch?.groups?.amount && descriptionMatch?.[1]) {
    const amount = parseAmount(amountMatch.groups.amount);
    const description = descriptionMatch[1].trim();

    if (!Number.isFinite(amount) || amount <= 0) {
      return { status: 'failed', reason: `Invalid amount "${amountMatch.groups.amount}"` };
    }
    if (!description) {
      return { status: 'failed', reason: 'Empty description' };
    }

    const account = amountMatch.groups.card || (rule.card ? text.match(rule.card)?.groups?.card : undefined);

    return {
      status: 'parsed',
      fields: account ? { amount, description, account } : { amount, description },
    };
  }

  // Only alerts the patterns can't read are checked for a failed payment
  if (NON_TRANSACTION.test(text)) {
    return { status: 'ignored', reason: 'Reversed, declined or incomplete transaction' };
  }

  return {
    status: 'failed',
    reason: amountMatch ? 'Could not extract description' : 'Could not extract amount',
  };
}

/**
 * Parser backed by one extraction rule per bank
 */
export abstract class RuleParser implements Parser {
  abstract readonly mode: TransactionMode;
  protected abstract readonly rules: Partial<Record<Bank, ExtractionRule>>;

  supports(bank: Bank): boolean {
    return this.rules[bank] !== undefined;
  }

  parse(bank: Bank, text: string): ParseOutcome {
    const rule = this.rules[bank];
    if (!rule) {
      return { status: 'failed', reason: `No ${this.mode} rule for ${bank}` };
    }
    return applyRule(rule, text);
  }
}
