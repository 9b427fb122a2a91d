export function isDuplicate(transactionId: string, existing: ReadonlySet<string>): boolean {
  return existing.has(transactionId);
}

/**
 * Transaction ids already in the sheet, plus the ones appended during this run
 */
export class Deduplicator {
  private readonly seen: Set<string>;

  constructor(existing: Iterable<string> = []) {
    this.seen = new Set(existing);
  }

  isDuplicate(transactionId: string): boolean {
    return isDuplicate(transactionId, this.seen);
  }

  remember(transactionId: string): void {
    this.seen.add(transactionId);
  }

  get size(): number {
    return this.seen.size;
  }
}
