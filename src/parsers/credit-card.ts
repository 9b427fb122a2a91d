import { Bank } from '../types';
import { AMOUNT, CURRENCY, ExtractionRule, RuleParser } from './common';

// "Card ending 1234", "ending with 1234", "Card XX1234"
const CARD = /(?:ending\s+(?:with\s+|in\s+)?|Card\s+(?:no\.?\s+)?)[X*]*(?<card>\d{4})\b/i;
const AT_MERCHANT = /\bat\s+(.*?)\s+on\b/i;

export class CreditCardParser extends RuleParser {
  readonly mode = 'CreditCard' as const;

  protected readonly rules: Partial<Record<Bank, ExtractionRule>> = {
    // "... Credit Card ending 1234 for Rs 1,499.50 at AMAZON on 05-03-2024"
    HDFC: {
      amount: new RegExp(String.raw`(?<card>\d{4})\s+for\s+${CURRENCY}\s*${AMOUNT}`, 'i'),
      description: AT_MERCHANT,
    },
    // "... Credit Card XX1234 has been used for a transaction of INR 2,000.00 on ... Info: SWIGGY."
    ICICI: {
      amount: new RegExp(String.raw`transaction\s+of\s+${CURRENCY}\s*${AMOUNT}`, 'i'),
      description: /Info:\s*(.*?)\.(?:\s|$)/i,
      card: CARD,
    },
    // "... ending with 4321, has been used for INR 850.00 for payment to ZOMATO on ..."
    HSBC: {
      amount: new RegExp(String.raw`been\s+used\s+for\s+${CURRENCY}\s*${AMOUNT}`, 'i'),
      description: /payment\s+to\s+(.*?)\s+on\b/i,
      card: CARD,
    },
    // "... Credit Card XX9339 for INR 540.00 at SWIGGY on ..."
    Axis: {
      amount: new RegExp(String.raw`(?<card>\d{4})\s+for\s+${CURRENCY}\s*${AMOUNT}`, 'i'),
      description: AT_MERCHANT,
    },
    // "... txn of ₹320.00 at UBER on ..."
    Federal: {
      amount: new RegExp(String.raw`txn\s+of\s+${CURRENCY}\s*${AMOUNT}`, 'i'),
      description: AT_MERCHANT,
      card: CARD,
    },
  };
}
