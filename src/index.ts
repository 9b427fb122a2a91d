export * from './types';
export * from './gmail/client';
export * from './gmail/mailbox';
export * from './sheets/client';
export * from './sheets/store';
export * from './db';
export * from './dedup';
export * from './parsers/registry';
export * from './parsers/detect';
export * from './parsers/transaction';
export * from './rules/engine';
export * from './importer/importer';
export * from './review';
export {
  loadConfig,
  parseTransactionLabels,
  type ImporterConfig,
  type SheetsConfig,
  type GmailConfig,
} from './config';
