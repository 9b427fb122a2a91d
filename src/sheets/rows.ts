import { Bank, ReviewedTransaction, Transaction, TransactionMode } from '../types';

// Column names
export const COL_TRANSACTION_ID = 'Transaction ID';
export const COL_DATE = 'Date';
export const COL_TIME = 'Time';
export const COL_RECIPIENT = 'Recipient';
export const COL_AMOUNT = 'Amount';
export const COL_BANK = 'Bank';
export const COL_MODE = 'Mode';
export const COL_ACCOUNT = 'Account';
export const COL_CATEGORY = 'Category';
export const COL_IS_SHARED = 'Is Shared';
export const COL_USER_SHARE = 'User Share';

export const RAW_HEADERS = [
  COL_TRANSACTION_ID, COL_DATE, COL_TIME, COL_RECIPIENT, COL_AMOUNT, COL_BANK, COL_MODE, COL_ACCOUNT,
];

export const REVIEWED_HEADERS = [...RAW_HEADERS, COL_CATEGORY, COL_IS_SHARED, COL_USER_SHARE];

const YES_VALUE = 'Yes';
const NO_VALUE = 'No';

const BANKS: readonly Bank[] = ['HDFC', 'ICICI', 'HSBC', 'Axis', 'Federal', 'Kotak'];

export interface HeaderAlignment {
  headers: string[];
  added: string[];
}

/**
 * Existing headers keep their position; missing ones are appended to the right
 */
export function alignHeaders(existing: string[], expected: string[]): HeaderAlignment {
  const headers = [...existing];
  const added: string[] = [];

  for (const header of expected) {
    if (!headers.includes(header)) {
      headers.push(header);
      added.push(header);
    }
  }

  return { headers, added };
}

export function buildRow(headers: string[], values: Record<string, string>): string[] {
  return headers.map(header => values[header] ?? '');
}

export function rawRowValues(transaction: Transaction): Record<string, string> {
  return {
    [COL_TRANSACTION_ID]: transaction.id,
    [COL_DATE]: transaction.date,
    [COL_TIME]: transaction.time,
    [COL_RECIPIENT]: transaction.recipient,
    [COL_AMOUNT]: String(transaction.amount),
    [COL_BANK]: transaction.bank,
    [COL_MODE]: transaction.mode,
    [COL_ACCOUNT]: transaction.account ?? '',
  };
}

export function reviewedRowValues(transaction: ReviewedTransaction): Record<string, string> {
  return {
    ...rawRowValues(transaction),
    [COL_CATEGORY]: transaction.category,
    [COL_IS_SHARED]: transaction.isShared ? YES_VALUE : NO_VALUE,
    [COL_USER_SHARE]: String(transaction.userShare),
  };
}

/**
 * Transaction ids in the `Transaction ID` column, header row excluded
 */
export function extractTransactionIds(rows: string[][]): Set<string> {
  const ids = new Set<string>();
  if (rows.length === 0) return ids;

  const column = rows[0].indexOf(COL_TRANSACTION_ID);
  if (column === -1) return ids;

  for (const row of rows.slice(1)) {
    const id = row[column]?.trim();
    if (id) ids.add(id);
  }

  return ids;
}

function isBank(value: string): value is Bank {
  return BANKS.some(bank => bank === value);
}

function isMode(value: string): value is TransactionMode {
  return value === 'CreditCard' || value === 'UPI';
}

/**
 * Read a raw-sheet row back into a transaction. Returns null for rows that don't hold one.
 */
export function rowToTransaction(headers: string[], row: string[]): Transaction | null {
  const cell = (name: string) => {
    const index = headers.indexOf(name);
    return index === -1 ? '' : (row[index] ?? '').trim();
  };

  const id = cell(COL_TRANSACTION_ID);
  const amount = parseFloat(cell(COL_AMOUNT).replace(/,/g, ''));
  const bank = cell(COL_BANK);
  const mode = cell(COL_MODE);

  if (!id || !Number.isFinite(amount) || !isBank(bank) || !isMode(mode)) {
    return null;
  }

  const transaction: Transaction = {
    id,
    date: cell(COL_DATE),
    time: cell(COL_TIME),
    recipient: cell(COL_RECIPIENT),
    amount,
    bank,
    mode,
    rawMessageId: '',
    rawThreadId: '',
  };

  const account = cell(COL_ACCOUNT);
  if (account) {
    transaction.account = account;
  }

  return transaction;
}
