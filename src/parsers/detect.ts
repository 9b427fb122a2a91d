import { Bank, Classification, GmailMessageData, TransactionMode } from '../types';

// Order matters: the first bank whose key appears wins
const BANK_KEYS: Array<[Bank, string]> = [
  ['HDFC', 'hdfc'],
  ['ICICI', 'icici'],
  ['HSBC', 'hsbc'],
  ['Axis', 'axis'],
  ['Federal', 'federal'],
  ['Kotak', 'kotak'],
];

export function detectBank(sender: string, body: string): Bank | null {
  const from = sender.toLowerCase();
  const text = body.toLowerCase();

  for (const [bank, key] of BANK_KEYS) {
    if (from.includes(key) || text.includes(`${key} bank`)) {
      return bank;
    }
  }

  return null;
}

/**
 * Mode of the first transaction label the message carries, falling back to body keywords
 */
export function detectMode(
  labelNames: Iterable<string>,
  body: string,
  transactionLabels: Record<string, TransactionMode>
): TransactionMode | null {
  for (const name of labelNames) {
    const mode = transactionLabels[name];
    if (mode) return mode;
  }

  if (/\bUPI\b/i.test(body)) return 'UPI';
  if (/credit\s+card/i.test(body)) return 'CreditCard';

  return null;
}

export function classify(
  message: GmailMessageData,
  text: string,
  labelNames: Iterable<string>,
  transactionLabels: Record<string, TransactionMode>
): Classification | null {
  const bank = detectBank(message.from, text);
  if (!bank) return null;

  const mode = detectMode(labelNames, text, transactionLabels);
  if (!mode) return null;

  return { bank, mode };
}
