import { ReviewedTransaction, Transaction } from '../types';
import { TransactionStore } from '../sheets/store';
import { AppError, ErrorType } from '../utils/errors';

export const EXPENSE_CATEGORIES = [
  'Investment',
  'Home & Essentials',
  'Commute',
  'Discretionary',
  'Shopping',
  'Health & Wellbeing',
  'Miscellaneous',
] as const;

export interface ReviewInput {
  category: string;
  shared: boolean;
  share?: number; // required for shared expenses
}

function invalid(message: string, context?: Record<string, unknown>): AppError {
  return new AppError({ type: ErrorType.VALIDATION_ERROR, message, retryable: false, context });
}

export function resolveCategory(input: string): string {
  const wanted = input.trim().toLowerCase();
  const category = EXPENSE_CATEGORIES.find(c => c.toLowerCase() === wanted);
  if (!category) {
    throw invalid(`Unknown category "${input}". Choose one of: ${EXPENSE_CATEGORIES.join(', ')}`);
  }
  return category;
}

/**
 * Solo expenses are fully the user's; a shared one records the user's part of the total
 */
export function buildReviewedTransaction(transaction: Transaction, input: ReviewInput): ReviewedTransaction {
  const category = resolveCategory(input.category);

  if (!input.shared) {
    return { ...transaction, category, isShared: false, userShare: transaction.amount };
  }

  const share = input.share;
  if (share === undefined || !Number.isFinite(share)) {
    throw invalid('A shared expense needs a numeric share amount');
  }
  if (share < 0) {
    throw invalid('Share amount cannot be negative', { share });
  }
  if (share > transaction.amount) {
    throw invalid(
      `Share amount (${share}) cannot be greater than total amount (${transaction.amount})`,
      { share, total: transaction.amount }
    );
  }

  return { ...transaction, category, isShared: true, userShare: share };
}

export async function reviewTransaction(
  store: TransactionStore,
  transactionId: string,
  input: ReviewInput
): Promise<ReviewedTransaction> {
  const transaction = await store.findRaw(transactionId);
  if (!transaction) {
    throw new AppError({
      type: ErrorType.NOT_FOUND,
      message: `Transaction ${transactionId} not found in the raw sheet`,
      retryable: false,
      context: { transactionId },
    });
  }

  const reviewed = buildReviewedTransaction(transaction, input);
  await store.appendReviewed(reviewed);
  return reviewed;
}
