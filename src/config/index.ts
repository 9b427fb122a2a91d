import path from 'path';
import { TransactionMode } from '../types';
import { configurationError } from '../utils/errors';
import { isLogLevel, LogLevel } from '../utils/logger';

export interface SheetsConfig {
  sheetId: string;
  sheetName: string;
  postReviewSheetName: string;
  serviceAccountCredentialsPath: string;
}

export interface GmailConfig {
  oauthCredentialsPath: string;
  tokenPath: string;
}

export interface ImporterConfig {
  sheets: SheetsConfig;
  gmail: GmailConfig;
  transactionLabels: Record<string, TransactionMode>; // Gmail label name -> mode
  processedLabel: string;
  dbPath: string;
  rulesPath: string;
  logLevel: LogLevel;
}

export const DEFAULT_TRANSACTION_LABELS: Record<string, TransactionMode> = {
  CreditCardTransactions: 'CreditCard',
  UPITransactions: 'UPI',
};

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw configurationError(`${name} is required. Set it in your environment or .env file.`);
  }
  return value;
}

function isMode(value: string): value is TransactionMode {
  return value === 'CreditCard' || value === 'UPI';
}

/**
 * Parse `Label:Mode` pairs, e.g. `CreditCardTransactions:CreditCard,UPITransactions:UPI`
 */
export function parseTransactionLabels(raw: string): Record<string, TransactionMode> {
  const labels: Record<string, TransactionMode> = {};

  for (const entry of raw.split(',').map(e => e.trim()).filter(Boolean)) {
    const separator = entry.lastIndexOf(':');
    const label = separator > 0 ? entry.slice(0, separator).trim() : '';
    const mode = entry.slice(separator + 1).trim();

    if (!label || !isMode(mode)) {
      throw configurationError(
        `Invalid TRANSACTION_LABELS entry "${entry}". Expected <label>:CreditCard or <label>:UPI`
      );
    }
    labels[label] = mode;
  }

  if (Object.keys(labels).length === 0) {
    throw configurationError('TRANSACTION_LABELS must name at least one label');
  }

  return labels;
}

/**
 * Load importer configuration from environment variables
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): ImporterConfig {
  const credentialsDir = path.resolve(cwd, env.CREDENTIALS_DIR || 'credentials');
  const logLevel = env.LOG_LEVEL || 'info';

  if (!isLogLevel(logLevel)) {
    throw configurationError(`LOG_LEVEL must be one of debug, info, warn, error (got "${logLevel}")`);
  }

  return {
    sheets: {
      sheetId: required(env, 'SHEET_ID'),
      sheetName: required(env, 'SHEET_NAME'),
      postReviewSheetName: required(env, 'SHEET_NAME_POST_REVIEW'),
      serviceAccountCredentialsPath: path.resolve(
        cwd,
        env.SERVICE_ACCOUNT_CREDENTIALS_PATH || path.join(credentialsDir, 'service_account_credentials.json')
      ),
    },
    gmail: loadGmailConfig(env, cwd),
    transactionLabels: env.TRANSACTION_LABELS
      ? parseTransactionLabels(env.TRANSACTION_LABELS)
      : { ...DEFAULT_TRANSACTION_LABELS },
    processedLabel: env.PROCESSED_LABEL?.trim() || 'Processed',
    dbPath: path.resolve(cwd, env.IMPORTER_DB_PATH || path.join('data', 'importer.db')),
    rulesPath: resolveRulesPath(env, cwd),
    logLevel,
  };
}

/**
 * Gmail-only settings; `authorize` runs before any sheet is configured
 */
export function loadGmailConfig(env: Env = process.env, cwd: string = process.cwd()): GmailConfig {
  const credentialsDir = path.resolve(cwd, env.CREDENTIALS_DIR || 'credentials');
  return {
    oauthCredentialsPath: path.resolve(
      cwd,
      env.GMAIL_OAUTH_CREDENTIALS_PATH || path.join(credentialsDir, 'gmail_oauth_credentials.json')
    ),
    tokenPath: path.resolve(cwd, env.GMAIL_TOKEN_PATH || path.join(credentialsDir, 'token.json')),
  };
}

export function resolveRulesPath(env: Env = process.env, cwd: string = process.cwd()): string {
  return path.resolve(cwd, env.RULES_PATH || 'rules.json');
}
