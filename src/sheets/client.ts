import { google, sheets_v4 } from 'googleapis';
import { ReviewedTransaction, Transaction } from '../types';
import { SheetsConfig } from '../config';
import { classifyError, formatError, retryWithBackoff, ErrorContext, RetryOptions } from '../utils/errors';
import { logger } from '../utils/logger';
import { TransactionStore } from './store';
import {
  RAW_HEADERS,
  REVIEWED_HEADERS,
  alignHeaders,
  buildRow,
  extractTransactionIds,
  rawRowValues,
  reviewedRowValues,
  rowToTransaction,
  COL_TRANSACTION_ID,
} from './rows';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

// Size of sheets created on first run
const NEW_SHEET_ROWS = 100;
const NEW_SHEET_COLUMNS = 20;

/**
 * A1 notation for a whole sheet, or a range inside it
 */
export function sheetRange(sheetName: string, range?: string): string {
  const quoted = `'${sheetName.replace(/'/g, "''")}'`;
  return range ? `${quoted}!${range}` : quoted;
}

function toCells(values: unknown[][] | null | undefined): string[][] {
  return (values ?? []).map(row => row.map(cell => (cell === null || cell === undefined ? '' : String(cell))));
}

export interface SheetsInitOptions {
  createMissingSheets?: boolean; // false for dry runs
}

export class SheetsClient implements TransactionStore {
  private sheets: sheets_v4.Sheets | null = null;
  private readonly spreadsheetId: string;
  private readonly rawSheet: string;
  private readonly reviewedSheet: string;
  // Sheets a dry run left uncreated; read as empty
  private readonly absentSheets = new Set<string>();

  constructor(private readonly config: SheetsConfig, private readonly retry: RetryOptions = {}) {
    this.spreadsheetId = config.sheetId;
    this.rawSheet = config.sheetName;
    this.reviewedSheet = config.postReviewSheetName;
  }

  async init(options: SheetsInitOptions = {}): Promise<void> {
    const auth = new google.auth.GoogleAuth({
      keyFile: this.config.serviceAccountCredentialsPath,
      scopes: SCOPES,
    });
    this.sheets = google.sheets({ version: 'v4', auth });

    await this.ensureSheets([this.rawSheet, this.reviewedSheet], options.createMissingSheets ?? true);
    logger.info('Connected to Google Sheets');
  }

  private async api(): Promise<sheets_v4.Sheets> {
    if (!this.sheets) await this.init();
    if (!this.sheets) throw new Error('Google Sheets client failed to initialize');
    return this.sheets;
  }

  private call<T>(description: string, fn: () => Promise<T>, context?: ErrorContext): Promise<T> {
    return retryWithBackoff(fn, {
      maxRetries: 3,
      initialDelay: 1000,
      ...this.retry,
      onRetry: (error, attempt) => {
        logger.warn(`Retrying ${description} (attempt ${attempt}): ${error.message}`);
      },
    }).catch((error: unknown) => {
      const appError = classifyError(error, { ...context, operation: description });
      logger.error(`Failed to ${description}:`, formatError(appError));
      throw appError;
    });
  }

  /**
   * Create the raw and post-review sheets when the spreadsheet doesn't have them yet
   */
  private async ensureSheets(titles: string[], create: boolean): Promise<void> {
    const sheets = await this.api();

    const res = await this.call('read spreadsheet metadata', () =>
      sheets.spreadsheets.get({
        spreadsheetId: this.spreadsheetId,
        fields: 'sheets.properties.title',
      })
    );

    const existing = new Set(
      (res.data.sheets ?? []).map(sheet => sheet.properties?.title).filter((t): t is string => Boolean(t))
    );
    const missing = [...new Set(titles)].filter(title => !existing.has(title));
    if (missing.length === 0) return;

    if (!create) {
      missing.forEach(title => this.absentSheets.add(title));
      logger.info(`Sheet(s) ${missing.join(', ')} not found; they would be created on a real import`);
      return;
    }

    await this.call('create sheets', () =>
      sheets.spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          requests: missing.map(title => ({
            addSheet: {
              properties: {
                title,
                gridProperties: { rowCount: NEW_SHEET_ROWS, columnCount: NEW_SHEET_COLUMNS },
              },
            },
          })),
        },
      })
    );
    logger.info(`Created sheet(s): ${missing.join(', ')}`);
  }

  async readRows(sheetName: string): Promise<string[][]> {
    if (this.absentSheets.has(sheetName)) return [];

    const sheets = await this.api();
    const res = await this.call(`read rows from ${sheetName}`, () =>
      sheets.spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range: sheetRange(sheetName),
      })
    );
    return toCells(res.data.values);
  }

  /**
   * Make sure the header row holds every expected column and return it
   */
  private async ensureHeaders(sheetName: string, expected: string[]): Promise<string[]> {
    const sheets = await this.api();
    const res = await this.call(`read headers of ${sheetName}`, () =>
      sheets.spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range: sheetRange(sheetName, '1:1'),
      })
    );

    const [current = []] = toCells(res.data.values);
    const { headers, added } = alignHeaders(current, expected);

    if (added.length > 0) {
      await this.call(`write headers of ${sheetName}`, () =>
        sheets.spreadsheets.values.update({
          spreadsheetId: this.spreadsheetId,
          range: sheetRange(sheetName, 'A1'),
          valueInputOption: 'RAW',
          requestBody: { values: [headers] },
        })
      );
      logger.debug(`Added headers to ${sheetName}`, added);
    }

    return headers;
  }

  private async hasTransactionId(sheetName: string, transactionId: string): Promise<boolean> {
    return extractTransactionIds(await this.readRows(sheetName)).has(transactionId);
  }

  /**
   * Appends are not idempotent: a request can land even though its response
   * fails. Every retry first checks whether the row is already there.
   */
  private async appendRow(
    sheetName: string,
    expected: string[],
    values: Record<string, string>,
    context: ErrorContext & { transactionId: string }
  ): Promise<void> {
    const headers = await this.ensureHeaders(sheetName, expected);
    const sheets = await this.api();
    let attempted = false;

    await this.call(
      `append row to ${sheetName}`,
      async () => {
        if (attempted && (await this.hasTransactionId(sheetName, context.transactionId))) {
          logger.warn(`Row ${context.transactionId} reached ${sheetName} despite the failed response`);
          return;
        }
        attempted = true;

        await sheets.spreadsheets.values.append({
          spreadsheetId: this.spreadsheetId,
          range: sheetRange(sheetName, 'A1'),
          valueInputOption: 'RAW',
          insertDataOption: 'INSERT_ROWS',
          requestBody: { values: [buildRow(headers, values)] },
        });
      },
      context
    );
  }

  async loadTransactionIds(): Promise<Set<string>> {
    return extractTransactionIds(await this.readRows(this.rawSheet));
  }

  async appendRaw(transaction: Transaction): Promise<void> {
    await this.appendRow(this.rawSheet, RAW_HEADERS, rawRowValues(transaction), {
      transactionId: transaction.id,
      recipient: transaction.recipient,
      amount: transaction.amount,
    });
  }

  async findRaw(transactionId: string): Promise<Transaction | null> {
    const [headers = [], ...rows] = await this.readRows(this.rawSheet);
    const column = headers.indexOf(COL_TRANSACTION_ID);
    if (column === -1) return null;

    const row = rows.find(r => r[column]?.trim() === transactionId);
    return row ? rowToTransaction(headers, row) : null;
  }

  async appendReviewed(transaction: ReviewedTransaction): Promise<void> {
    await this.appendRow(this.reviewedSheet, REVIEWED_HEADERS, reviewedRowValues(transaction), {
      transactionId: transaction.id,
      category: transaction.category,
    });
  }
}
