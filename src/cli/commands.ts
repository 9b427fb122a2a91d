import fs from 'fs-extra';
import { GmailClient } from '../gmail/client';
import { authorize } from '../gmail/auth';
import { SheetsClient } from '../sheets/client';
import { ImportLog, initDB } from '../db';
import { RulesEngine, createRulesTemplate } from '../rules/engine';
import { Importer, ImportSummary } from '../importer/importer';
import { reviewTransaction } from '../review';
import { ImporterConfig, loadConfig, loadGmailConfig, resolveRulesPath } from '../config';
import { classifyError, formatError } from '../utils/errors';
import { logger } from '../utils/logger';

function reportFailure(action: string, error: unknown): void {
  const appError = classifyError(error);
  logger.error(`Failed to ${action}: ${formatError(appError)}`);
  process.exitCode = 1;
}

function openLog(config: ImporterConfig): ImportLog {
  return new ImportLog(initDB(config.dbPath));
}

function printSummary(summary: ImportSummary, dryRun: boolean) {
  console.log(dryRun ? 'Dry run complete.' : 'Processing complete.');
  console.log(`  Scanned: ${summary.scanned}`);
  console.log(`  ${dryRun ? 'Would append' : 'Appended'}: ${summary.appended}`);
  console.log(`  Duplicates: ${summary.duplicates}`);
  console.log(`  Reversed/declined: ${summary.ignored}`);
  console.log(`  Unrecognized: ${summary.unrecognized}`);
  console.log(`  Unparseable: ${summary.failed}`);
  console.log(`  Errors: ${summary.errors}`);
  if (summary.unrecognized + summary.failed > 0) {
    console.log('\nRun "npm start unparsed" to see the emails left for manual review.');
  }
}

export async function runImport(options: { labels?: string[]; dryRun?: boolean } = {}) {
  let log: ImportLog | undefined;
  try {
    const config = loadConfig();
    logger.setLevel(config.logLevel);
    log = openLog(config);

    const dryRun = options.dryRun ?? false;
    const sheets = new SheetsClient(config.sheets);
    await sheets.init({ createMissingSheets: !dryRun });

    const importer = new Importer({
      mailbox: new GmailClient(config.gmail),
      store: sheets,
      transactionLabels: config.transactionLabels,
      processedLabel: config.processedLabel,
      log,
      rules: RulesEngine.fromFile(config.rulesPath),
    });

    const summary = await importer.run({ labels: options.labels, dryRun });
    printSummary(summary, dryRun);
    if (summary.aborted) process.exitCode = 1;
  } catch (error) {
    reportFailure('import transactions', error);
  } finally {
    log?.close();
  }
}

export async function authorizeGmail() {
  try {
    await authorize(loadGmailConfig(), { forceNewToken: true });
    console.log('Gmail access authorized.');
  } catch (error) {
    reportFailure('authorize Gmail access', error);
  }
}

export async function review(
  transactionId: string,
  options: { category: string; shared?: boolean; share?: string }
) {
  try {
    const config = loadConfig();
    logger.setLevel(config.logLevel);

    const sheets = new SheetsClient(config.sheets);
    await sheets.init();

    const reviewed = await reviewTransaction(sheets, transactionId, {
      category: options.category,
      shared: options.shared ?? false,
      share: options.share !== undefined ? parseFloat(options.share) : undefined,
    });

    console.log('Transaction Updated');
    console.log(`  Recipient: ${reviewed.recipient}`);
    console.log(`  Amount: ${reviewed.amount}`);
    if (reviewed.account) console.log(`  Account: ${reviewed.account}`);
    console.log(`  Category: ${reviewed.category}`);
    console.log(`  Type: ${reviewed.isShared ? 'Shared' : 'Solo'} expense`);
    console.log(`  Your share: ${reviewed.userShare}`);
  } catch (error) {
    reportFailure('review transaction', error);
  }
}

export async function listUnparsed() {
  let log: ImportLog | undefined;
  try {
    log = openLog(loadConfig());
    const entries = log.listUnparsed();

    if (entries.length === 0) {
      console.log('No emails waiting for manual review.');
      return;
    }

    console.log(`\n${entries.length} email(s) waiting for manual review:`);
    console.log('─'.repeat(60));
    for (const entry of entries) {
      console.log(`Message: ${entry.messageId}`);
      console.log(`Subject: ${entry.subject}`);
      console.log(`From: ${entry.sender}`);
      console.log(`Date: ${entry.date}`);
      console.log(`Reason: ${entry.reason} (seen ${entry.attempts}x)`);
      console.log('─'.repeat(60));
    }
  } catch (error) {
    reportFailure('list unparsed emails', error);
  } finally {
    log?.close();
  }
}

export async function listHistory(options: { limit?: number } = {}) {
  let log: ImportLog | undefined;
  try {
    log = openLog(loadConfig());
    const runs = log.listRuns(options.limit ?? 10);

    if (runs.length === 0) {
      console.log('No import runs recorded yet.');
      return;
    }

    for (const run of runs) {
      console.log(
        `${run.startedAt}${run.dryRun ? ' [dry run]' : ''}: scanned ${run.scanned}, appended ${run.appended}, ` +
        `duplicates ${run.duplicates}, unrecognized ${run.unrecognized}, unparseable ${run.failed}, errors ${run.errors}`
      );
    }
  } catch (error) {
    reportFailure('list import history', error);
  } finally {
    log?.close();
  }
}

export async function setupRules() {
  try {
    const rulesPath = resolveRulesPath();
    if (await fs.pathExists(rulesPath)) {
      console.log(`${rulesPath} already exists; leaving it untouched.`);
      return;
    }
    createRulesTemplate(rulesPath);
    console.log(`Created template rules at ${rulesPath}`);
  } catch (error) {
    reportFailure('create rules template', error);
  }
}
