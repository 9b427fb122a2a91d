export type Bank = 'HDFC' | 'ICICI' | 'HSBC' | 'Axis' | 'Federal' | 'Kotak';

export type TransactionMode = 'CreditCard' | 'UPI';

export interface Transaction {
  id: string; // fingerprint
  date: string; // yyyy-MM-dd
  time: string; // HH:mm:ss
  recipient: string;
  amount: number;
  bank: Bank;
  mode: TransactionMode;
  account?: string; // last 4 digits
  rawMessageId: string;
  rawThreadId: string;
}

export interface ReviewedTransaction extends Transaction {
  category: string;
  isShared: boolean;
  userShare: number;
}

export interface GmailMessageData {
  id: string;
  threadId: string;
  labelIds: string[];
  subject: string;
  from: string;
  date: Date;
  snippet: string;
  plainBody: string;
  htmlBody: string;
}

export interface Classification {
  bank: Bank;
  mode: TransactionMode;
}

export interface ParsedFields {
  amount: number;
  description: string;
  account?: string;
}

export type ParseOutcome =
  | { status: 'parsed'; fields: ParsedFields }
  | { status: 'ignored'; reason: string }
  | { status: 'failed'; reason: string };

export interface Parser {
  mode: TransactionMode;
  supports(bank: Bank): boolean;
  parse(bank: Bank, text: string): ParseOutcome;
}
