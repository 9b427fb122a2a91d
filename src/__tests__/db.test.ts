import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ImportLog, ImportRun, initDB } from '../db';

const entry = {
  messageId: 'msg-1',
  reason: 'No bank/type pattern matched',
  subject: 'Your statement',
  sender: 'offers@example.com',
  date: '2024-03-05T09:00:00.000Z',
};

function run(overrides: Partial<ImportRun> = {}): ImportRun {
  return {
    startedAt: '2024-03-05T09:00:00.000Z',
    finishedAt: '2024-03-05T09:00:05.000Z',
    scanned: 4,
    appended: 2,
    duplicates: 1,
    ignored: 0,
    unrecognized: 1,
    failed: 0,
    errors: 0,
    dryRun: false,
    ...overrides,
  };
}

describe('ImportLog', () => {
  let log: ImportLog;

  beforeEach(() => {
    log = new ImportLog(initDB(':memory:'));
  });

  afterEach(() => {
    log.close();
  });

  it('should record messages left for review', () => {
    log.recordUnparsed(entry);

    expect(log.listUnparsed()).toEqual([
      expect.objectContaining({ ...entry, attempts: 1 }),
    ]);
  });

  it('should count repeated attempts and keep the latest reason', () => {
    log.recordUnparsed(entry);
    log.recordUnparsed({ ...entry, reason: 'HDFC CreditCard: Could not extract amount' });

    const [message] = log.listUnparsed();
    expect(message.attempts).toBe(2);
    expect(message.reason).toBe('HDFC CreditCard: Could not extract amount');
  });

  it('should list the newest messages first', () => {
    log.recordUnparsed(entry);
    log.recordUnparsed({ ...entry, messageId: 'msg-2', date: '2024-03-06T09:00:00.000Z' });

    expect(log.listUnparsed().map(m => m.messageId)).toEqual(['msg-2', 'msg-1']);
  });

  it('should drop resolved messages', () => {
    log.recordUnparsed(entry);
    log.resolve('msg-1');
    log.resolve('msg-unknown');

    expect(log.listUnparsed()).toEqual([]);
  });

  it('should keep a history of runs, newest first', () => {
    const first = log.recordRun(run());
    const second = log.recordRun(run({ dryRun: true, appended: 0 }));

    expect(second).toBeGreaterThan(first);
    expect(log.listRuns()).toEqual([
      { ...run({ dryRun: true, appended: 0 }), id: second },
      { ...run(), id: first },
    ]);
    expect(log.listRuns(1)).toHaveLength(1);
  });
});
