import { Mailbox, MailboxLabel } from '../gmail/mailbox';
import { TransactionStore } from '../sheets/store';
import { GmailMessageData, ReviewedTransaction, Transaction } from '../types';

export const ALERTS = {
  hdfc: 'Dear Card Member, Thank you for using your HDFC Bank Credit Card ending 7883 for Rs 1,499.50 at AMAZON PAY INDIA on 05-03-2024 14:30:00. Authorization code:- 123456',
  icici: 'Dear Customer, Your ICICI Bank Credit Card XX4321 has been used for a transaction of INR 2,000.00 on Mar 05, 2024 at 10:15:32. Info: SWIGGY BANGALORE. The Available Credit Limit on your card is INR 50,000.00',
  hsbc: 'Dear Cardholder, your Credit card no ending with 5566, has been used for INR 850.00 for payment to ZOMATO LTD on 05 Mar 2024 at 12:00.',
  axis: 'Thank you for using your Axis Bank Credit Card XX9339 for INR 540 at UBER INDIA on 05-03-2024.',
  federalCard: 'Your Federal Bank Credit Card ending in 1122 was used for a txn of ₹320.00 at CAFE COFFEE DAY on 05-03-2024.',
  federalUpi: 'Rs 250.00 debited from your A/c XX5678 via UPI to shop@okaxis. Ref No 412345678901. - Federal Bank',
  kotakUpi: 'Sent Rs.120.00 from Kotak Bank AC X4321 to grocer@ybl on 05-03-24. UPI Ref 406512345678.',
  hdfcDeclined: 'Your HDFC Bank Credit Card transaction of Rs 500.00 at FLIPKART has been declined due to insufficient limit.',
  newsletter: 'Check out our latest offers on home loans!',
};

let counter = 0;

export function makeMessage(overrides: Partial<GmailMessageData> = {}): GmailMessageData {
  counter++;
  return {
    id: `msg-${counter}`,
    threadId: `thread-${counter}`,
    labelIds: [],
    subject: 'Transaction alert',
    from: 'alerts@hdfcbank.net',
    date: new Date(2024, 2, 5, 14, 30, 0),
    snippet: '',
    plainBody: ALERTS.hdfc,
    htmlBody: '',
    ...overrides,
  };
}

export class FakeMailbox implements Mailbox {
  labels: MailboxLabel[];
  messages = new Map<string, GmailMessageData>();
  failLabeling = false;

  constructor(labelNames: string[] = ['CreditCardTransactions', 'UPITransactions', 'Processed']) {
    this.labels = labelNames.map((name, index) => ({ id: `Label_${index + 1}`, name }));
  }

  labelId(name: string): string {
    const label = this.labels.find(l => l.name === name);
    if (!label) throw new Error(`No label ${name}`);
    return label.id;
  }

  add(message: GmailMessageData, ...labelNames: string[]): GmailMessageData {
    const stored = { ...message, labelIds: [...message.labelIds, ...labelNames.map(n => this.labelId(n))] };
    this.messages.set(stored.id, stored);
    return stored;
  }

  hasLabel(messageId: string, labelName: string): boolean {
    const label = this.labels.find(l => l.name === labelName);
    return Boolean(label && this.messages.get(messageId)?.labelIds.includes(label.id));
  }

  async listLabels(): Promise<MailboxLabel[]> {
    return [...this.labels];
  }

  async createLabel(name: string): Promise<MailboxLabel> {
    const label = { id: `Label_${this.labels.length + 1}`, name };
    this.labels.push(label);
    return label;
  }

  // Understands the `-label:<name>` queries the importer sends
  async listMessageIds(labelId: string, query: string): Promise<string[]> {
    const excluded = query.match(/^-label:(.+)$/)?.[1];
    const excludedId = this.labels.find(l => l.name === excluded)?.id;

    return [...this.messages.values()]
      .filter(m => m.labelIds.includes(labelId))
      .filter(m => !excludedId || !m.labelIds.includes(excludedId))
      .map(m => m.id);
  }

  async getMessage(id: string): Promise<GmailMessageData | null> {
    return this.messages.get(id) ?? null;
  }

  async addLabel(messageId: string, labelId: string): Promise<void> {
    if (this.failLabeling) throw new Error('modify failed');
    const message = this.messages.get(messageId);
    if (message && !message.labelIds.includes(labelId)) {
      message.labelIds.push(labelId);
    }
  }
}

export class MemoryStore implements TransactionStore {
  raw: Transaction[] = [];
  reviewed: ReviewedTransaction[] = [];
  failAppend: ((transaction: Transaction) => unknown) | null = null;
  private readonly existingIds: Set<string>;

  constructor(existingIds: string[] = []) {
    this.existingIds = new Set(existingIds);
  }

  async loadTransactionIds(): Promise<Set<string>> {
    return new Set([...this.existingIds, ...this.raw.map(t => t.id)]);
  }

  async appendRaw(transaction: Transaction): Promise<void> {
    const failure = this.failAppend?.(transaction);
    if (failure) throw failure;
    this.raw.push(transaction);
  }

  async findRaw(transactionId: string): Promise<Transaction | null> {
    return this.raw.find(t => t.id === transactionId) ?? null;
  }

  async appendReviewed(transaction: ReviewedTransaction): Promise<void> {
    this.reviewed.push(transaction);
  }
}
