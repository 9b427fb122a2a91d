import { Mailbox } from '../gmail/mailbox';
import { TransactionStore } from '../sheets/store';
import { ImportLog } from '../db';
import { Deduplicator } from '../dedup';
import { RulesEngine } from '../rules/engine';
import { ParserRegistry, parserRegistry } from '../parsers/registry';
import { classify } from '../parsers/detect';
import { messageText } from '../parsers/text';
import { buildTransaction } from '../parsers/transaction';
import { GmailMessageData, ParseOutcome, TransactionMode } from '../types';
import { AppError, ErrorType, classifyError, formatError, isFatal } from '../utils/errors';
import { logger } from '../utils/logger';

export type MessageOutcome = 'appended' | 'duplicate' | 'ignored' | 'unrecognized' | 'failed' | 'error';

export interface ImportSummary {
  scanned: number;
  appended: number;
  duplicates: number;
  ignored: number;
  unrecognized: number;
  failed: number;
  errors: number;
  aborted: boolean;
}

export interface ImportOptions {
  labels?: string[]; // defaults to every configured transaction label
  dryRun?: boolean;
}

export interface ImporterDeps {
  mailbox: Mailbox;
  store: TransactionStore;
  transactionLabels: Record<string, TransactionMode>;
  processedLabel: string;
  log?: ImportLog;
  rules?: RulesEngine;
  registry?: ParserRegistry;
}

interface RunContext {
  labelNames: Map<string, string>; // label id -> name
  processedLabelId: string | null;
  dedup: Deduplicator;
  dryRun: boolean;
}

const OUTCOME_COUNTERS: Record<MessageOutcome, keyof Omit<ImportSummary, 'scanned' | 'aborted'>> = {
  appended: 'appended',
  duplicate: 'duplicates',
  ignored: 'ignored',
  unrecognized: 'unrecognized',
  failed: 'failed',
  error: 'errors',
};

/**
 * Gmail search term excluding messages that already carry the label
 */
export function excludeLabelQuery(labelName: string): string {
  return `-label:${labelName.trim().replace(/[\s/]+/g, '-')}`;
}

export function emptySummary(): ImportSummary {
  return {
    scanned: 0,
    appended: 0,
    duplicates: 0,
    ignored: 0,
    unrecognized: 0,
    failed: 0,
    errors: 0,
    aborted: false,
  };
}

/**
 * Moves labeled transaction emails into the sheet, one message at a time.
 * A message gets the processed label only once its row is stored, it turns
 * out to be a duplicate, or the alert is for a reversed/declined payment.
 */
export class Importer {
  private readonly rules: RulesEngine;
  private readonly registry: ParserRegistry;

  constructor(private readonly deps: ImporterDeps) {
    this.rules = deps.rules ?? new RulesEngine();
    this.registry = deps.registry ?? parserRegistry;
  }

  async run(options: ImportOptions = {}): Promise<ImportSummary> {
    const startedAt = new Date().toISOString();
    const dryRun = options.dryRun ?? false;
    const summary = emptySummary();

    const labels = await this.deps.mailbox.listLabels();
    const labelNames = new Map(labels.map(l => [l.id, l.name]));
    const labelIds = new Map(labels.map(l => [l.name, l.id]));

    const context: RunContext = {
      labelNames,
      processedLabelId: await this.resolveProcessedLabel(labelIds, dryRun),
      dedup: new Deduplicator(await this.deps.store.loadTransactionIds()),
      dryRun,
    };
    logger.debug(`Loaded ${context.dedup.size} existing transaction ids`);

    const sourceLabels = options.labels?.length ? options.labels : Object.keys(this.deps.transactionLabels);
    const handled = new Set<string>();

    for (const labelName of sourceLabels) {
      const labelId = labelIds.get(labelName);
      if (!labelId) {
        logger.warn(`No label named ${labelName} was found, skipping it`);
        continue;
      }

      const messageIds = await this.deps.mailbox.listMessageIds(labelId, excludeLabelQuery(this.deps.processedLabel));
      logger.info(`Found ${messageIds.length} ${labelName} entries to process`);

      for (const messageId of messageIds) {
        // A message can carry more than one transaction label
        if (handled.has(messageId)) continue;
        handled.add(messageId);
        summary.scanned++;

        try {
          const outcome = await this.processMessage(messageId, context);
          summary[OUTCOME_COUNTERS[outcome]]++;
        } catch (error) {
          const appError = classifyError(error, { messageId });
          summary.errors++;

          if (isFatal(appError)) {
            logger.error(`Stopping import: ${formatError(appError)}`);
            summary.aborted = true;
            break;
          }

          // Left unlabeled for the next run
          logger.error(`Failed to process message ${messageId}:`, formatError(appError));
        }
      }

      if (summary.aborted) break;
    }

    this.deps.log?.recordRun({
      startedAt,
      finishedAt: new Date().toISOString(),
      scanned: summary.scanned,
      appended: summary.appended,
      duplicates: summary.duplicates,
      ignored: summary.ignored,
      unrecognized: summary.unrecognized,
      failed: summary.failed,
      errors: summary.errors,
      dryRun,
    });

    return summary;
  }

  private async resolveProcessedLabel(labelIds: Map<string, string>, dryRun: boolean): Promise<string | null> {
    const existing = labelIds.get(this.deps.processedLabel);
    if (existing || dryRun) return existing ?? null;

    const created = await this.deps.mailbox.createLabel(this.deps.processedLabel);
    logger.info(`Created label ${created.name}`);
    return created.id;
  }

  /**
   * Handle one message. The message is labeled only on the paths that return
   * normally after `markProcessed`; anything thrown leaves it unlabeled.
   */
  private async processMessage(messageId: string, context: RunContext): Promise<MessageOutcome> {
    const message = await this.deps.mailbox.getMessage(messageId);
    if (!message) return 'error';

    const text = messageText(message);
    const labelNames = message.labelIds.flatMap(id => {
      const name = context.labelNames.get(id);
      return name ? [name] : [];
    });

    const classification = classify(message, text, labelNames, this.deps.transactionLabels);
    if (!classification) {
      logger.info(`Unrecognized email left for review: ${message.subject} (From: ${message.from})`);
      this.leaveForReview(message, 'No bank/type pattern matched');
      return 'unrecognized';
    }

    const parser = this.registry.findParser(classification.mode);
    const outcome: ParseOutcome = parser
      ? parser.parse(classification.bank, text)
      : { status: 'failed', reason: `No parser for ${classification.mode}` };

    if (outcome.status === 'failed') {
      const error = new AppError({
        type: ErrorType.PARSING_ERROR,
        message: outcome.reason,
        retryable: false,
        context: { messageId, bank: classification.bank, mode: classification.mode },
      });
      logger.warn(`Unparseable email left for review: ${formatError(error)}`);
      this.leaveForReview(message, `${classification.bank} ${classification.mode}: ${outcome.reason}`);
      return 'failed';
    }

    if (outcome.status === 'ignored') {
      logger.info(`Skipping ${classification.bank} alert: ${outcome.reason}`);
      await this.markProcessed(message, context);
      return 'ignored';
    }

    const transaction = this.rules.apply(buildTransaction(message, classification, outcome.fields));

    if (context.dedup.isDuplicate(transaction.id)) {
      logger.info(`Entry ${transaction.id} already recorded. Skipping.`);
      await this.markProcessed(message, context);
      return 'duplicate';
    }

    if (context.dryRun) {
      logger.info(
        `[DRY RUN] ${transaction.bank} ${transaction.mode}: ${transaction.date} ${transaction.time} - ` +
        `${transaction.recipient} - ${transaction.amount}`
      );
      context.dedup.remember(transaction.id);
      return 'appended';
    }

    try {
      await this.deps.store.appendRaw(transaction);
    } catch (error) {
      const appError = classifyError(error, { messageId, transactionId: transaction.id });
      if (isFatal(appError)) throw appError;

      // Left unlabeled; the next run retries and dedup guards against a row that did land
      logger.error(`Failed to append transaction from message ${messageId}:`, formatError(appError));
      return 'error';
    }

    context.dedup.remember(transaction.id);
    logger.info(`Recorded ${transaction.bank} ${transaction.mode}: ${transaction.recipient} ${transaction.amount}`);
    await this.markProcessed(message, context);
    return 'appended';
  }

  private leaveForReview(message: GmailMessageData, reason: string): void {
    this.deps.log?.recordUnparsed({
      messageId: message.id,
      reason,
      subject: message.subject,
      sender: message.from,
      date: message.date.toISOString(),
    });
  }

  private async markProcessed(message: GmailMessageData, context: RunContext): Promise<void> {
    if (context.dryRun) return;

    this.deps.log?.resolve(message.id);
    if (!context.processedLabelId) return;

    try {
      await this.deps.mailbox.addLabel(message.id, context.processedLabelId);
    } catch (error) {
      // The next run sees the message again and dedup drops it before labeling
      logger.warn(`Failed to label message ${message.id}: ${formatError(classifyError(error))}`);
    }
  }
}
