import crypto from 'crypto';
import { format } from 'date-fns';
import { Classification, GmailMessageData, ParsedFields, Transaction } from '../types';

// Whole amounts carry one decimal place: 1500 -> "1500.0", 1499.5 -> "1499.5"
export function formatFingerprintAmount(amount: number): string {
  return Number.isInteger(amount) ? amount.toFixed(1) : String(amount);
}

export function getFingerprint(dateTime: string, description: string, amount: number, bank: string): string {
  return `${dateTime}|${description}|${formatFingerprintAmount(amount)}|${bank}`;
}

export function getTransactionId(dateTime: string, description: string, amount: number, bank: string): string {
  return crypto
    .createHash('md5')
    .update(getFingerprint(dateTime, description, amount, bank))
    .digest('hex');
}

/**
 * Assemble a transaction record. Alerts are stamped with the email's received time.
 */
export function buildTransaction(
  message: GmailMessageData,
  classification: Classification,
  fields: ParsedFields
): Transaction {
  const date = format(message.date, 'yyyy-MM-dd');
  const time = format(message.date, 'HH:mm:ss');

  const transaction: Transaction = {
    id: getTransactionId(`${date} ${time}`, fields.description, fields.amount, classification.bank),
    date,
    time,
    recipient: fields.description,
    amount: fields.amount,
    bank: classification.bank,
    mode: classification.mode,
    rawMessageId: message.id,
    rawThreadId: message.threadId,
  };

  if (fields.account) {
    transaction.account = fields.account;
  }

  return transaction;
}
