import { ReviewedTransaction, Transaction } from '../types';

/**
 * Where imported transactions are recorded
 */
export interface TransactionStore {
  loadTransactionIds(): Promise<Set<string>>;
  appendRaw(transaction: Transaction): Promise<void>;
  findRaw(transactionId: string): Promise<Transaction | null>;
  appendReviewed(transaction: ReviewedTransaction): Promise<void>;
}
