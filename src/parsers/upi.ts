import { Bank } from '../types';
import { AMOUNT, CURRENCY, ExtractionRule, RuleParser } from './common';

export class UpiParser extends RuleParser {
  readonly mode = 'UPI' as const;

  protected readonly rules: Partial<Record<Bank, ExtractionRule>> = {
    // "Rs 250.00 debited from your A/c XX5678 via UPI to shop@okaxis. Ref No 412345678901."
    Federal: {
      amount: new RegExp(String.raw`${CURRENCY}\s*${AMOUNT}`, 'i'),
      description: /\bto\s+(.*?)\.(?:\s|$)/i,
      card: /A\/c\s+[X*]*(?<card>\d{4})\b/i,
    },
    // "Sent Rs.120.00 from Kotak Bank AC X4321 to shop@ybl on 05-03-24."
    Kotak: {
      amount: new RegExp(String.raw`Sent\s+${CURRENCY}\s*${AMOUNT}`, 'i'),
      description: /\bto\s+(.*?)\s+on\b/i,
      card: /\bAC\s+[X*]*(?<card>\d{4})\b/i,
    },
  };
}
