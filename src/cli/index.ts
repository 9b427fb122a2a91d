#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import {
  runImport,
  authorizeGmail,
  review,
  listUnparsed,
  listHistory,
  setupRules,
} from './commands';

const program = new Command();

program
  .name('expenses-importer')
  .description('Import labeled bank transaction emails from Gmail into a Google Sheet')
  .version('1.0.0');

program.command('import')
  .description('Parse unprocessed transaction emails and append them to the sheet')
  .option('-l, --label <names...>', 'Gmail labels to read (defaults to TRANSACTION_LABELS)')
  .option('--dry-run', 'Parse and report without writing rows or labels')
  .action(async (options: { label?: string[]; dryRun?: boolean }) => {
    await runImport({ labels: options.label, dryRun: options.dryRun });
  });

program.command('dry-run')
  .description('Simulate an import without saving')
  .option('-l, --label <names...>', 'Gmail labels to read (defaults to TRANSACTION_LABELS)')
  .action(async (options: { label?: string[] }) => {
    await runImport({ labels: options.label, dryRun: true });
  });

program.command('authorize')
  .description('Authorize Gmail access and store the OAuth token')
  .action(async () => {
    await authorizeGmail();
  });

program.command('review')
  .description('Categorize an imported transaction into the post-review sheet')
  .argument('<transactionId>', 'Transaction ID from the raw sheet')
  .requiredOption('-c, --category <name>', 'Expense category')
  .option('--shared', 'Mark as a shared expense')
  .option('-s, --share <amount>', 'Your share of a shared expense')
  .action(async (transactionId: string, options: { category: string; shared?: boolean; share?: string }) => {
    await review(transactionId, options);
  });

program.command('unparsed')
  .description('List emails left for manual review')
  .action(async () => {
    await listUnparsed();
  });

program.command('history')
  .description('List recent import runs')
  .option('-n, --limit <number>', 'Number of runs to show', '10')
  .action(async (options: { limit: string }) => {
    await listHistory({ limit: parseInt(options.limit, 10) || 10 });
  });

program.command('setup-rules')
  .description('Create a rules.json merchant normalization template')
  .action(async () => {
    await setupRules();
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
