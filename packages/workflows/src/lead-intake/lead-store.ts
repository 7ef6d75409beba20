/**
 * Lead Store
 *
 * Append-only lead log kept in a spreadsheet. The store addresses rows by
 * contact identity (Email or Phone column); the derived lead_id is not
 * written. Every operation resolves: transport faults become false, empty
 * or failure outcomes.
 *
 * Duplicate check and append are two separate round trips, so two
 * concurrent submissions for the same contact can both be appended.
 *
 * @module lead-intake/lead-store
 */

import { google, type sheets_v4 } from 'googleapis';
import { getErrorMessage, stepFailure } from '@lead-intake/lib';
import type { Lead } from './contracts/lead-input';
import type { ProcessedLead } from './contracts/processed-lead';
import { classifyError } from './error-handler';
import { logger as defaultLogger, type LeadIntakeLogger } from './logger';
import {
  LEAD_SHEET_HEADERS,
  type AppendOutput,
  type LeadRecord,
  type LeadRowValues,
  type UpdateStatusOutput,
} from './types';

// ===========================================
// Sheet Table
// ===========================================

/**
 * Row-oriented table with a header row. Rows and columns are 1-based.
 */
export interface SheetTable {
  /** Values of row 1, empty when the sheet has no header */
  getHeaderRow(): Promise<string[]>;
  /** Every row below the header, keyed by header name */
  getAllRecords(): Promise<LeadRecord[]>;
  appendRow(values: ReadonlyArray<string | number>): Promise<void>;
  /** Row number of the first cell in `column` equal to `value`, or null */
  findInColumn(column: number, value: string): Promise<number | null>;
  updateCell(row: number, column: number, value: string): Promise<void>;
}

/** Column matched by updateStatus */
export const STATUS_LOOKUP_COLUMN = 2;
export const STATUS_COLUMN = 9;
export const NOTES_COLUMN = 10;

// ===========================================
// Lead Store
// ===========================================

export interface LeadStore {
  /** Whether any row's Email or Phone equals key */
  exists(key: string): Promise<boolean>;
  append(lead: Lead, processed: ProcessedLead): Promise<AppendOutput>;
  listAll(): Promise<LeadRecord[]>;
  /** First row whose Email or Phone equals key */
  find(key: string): Promise<LeadRecord | null>;
  updateStatus(key: string, status: string, notes?: string): Promise<UpdateStatusOutput>;
}

function matchesContact(record: LeadRecord, key: string): boolean {
  return record['Email'] === key || record['Phone'] === key;
}

/**
 * Build the row written for a lead, in header order
 */
export function buildLeadRow(lead: Lead, processed: ProcessedLead): LeadRowValues {
  return [
    lead.timestamp,
    processed.name,
    lead.email,
    processed.phone,
    processed.model,
    processed.datetime,
    processed.intent_score,
  ];
}

export class SheetLeadStore implements LeadStore {
  private readonly logger: LeadIntakeLogger;
  private headerReady: Promise<void> | null = null;

  constructor(
    private readonly table: SheetTable,
    options: { logger?: LeadIntakeLogger } = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Write the header row when row 1 is empty. Runs once; retried on the
   * next call if it failed.
   */
  ensureHeader(): Promise<void> {
    if (!this.headerReady) {
      this.headerReady = this.writeHeaderIfMissing().catch((error: unknown) => {
        this.headerReady = null;
        throw error;
      });
    }
    return this.headerReady;
  }

  private async writeHeaderIfMissing(): Promise<void> {
    const header = await this.table.getHeaderRow();
    if (header.length === 0) {
      await this.table.appendRow(LEAD_SHEET_HEADERS);
      this.logger.info('Created lead sheet header row');
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.ensureHeader();
      const records = await this.table.getAllRecords();
      return records.some((record) => matchesContact(record, key));
    } catch (error) {
      this.logFailure('exists', error);
      return false;
    }
  }

  async append(lead: Lead, processed: ProcessedLead): Promise<AppendOutput> {
    if (await this.exists(lead.email)) {
      this.logger.duplicateDetected({ lead_id: lead.lead_id });
      return stepFailure('DUPLICATE', `Lead ${lead.lead_id} already exists`);
    }

    try {
      const row = buildLeadRow(lead, processed);
      await this.table.appendRow(row);
      this.logger.leadStored({ lead_id: lead.lead_id, name: processed.name });
      return { success: true, row };
    } catch (error) {
      this.logFailure('append', error, lead.lead_id);
      return stepFailure('STORE_ERROR', getErrorMessage(error));
    }
  }

  async listAll(): Promise<LeadRecord[]> {
    try {
      await this.ensureHeader();
      return await this.table.getAllRecords();
    } catch (error) {
      this.logFailure('listAll', error);
      return [];
    }
  }

  async find(key: string): Promise<LeadRecord | null> {
    try {
      await this.ensureHeader();
      const records = await this.table.getAllRecords();
      return records.find((record) => matchesContact(record, key)) ?? null;
    } catch (error) {
      this.logFailure('find', error);
      return null;
    }
  }

  /**
   * Set status (column 9) and, when given, notes (column 10) on the row
   * whose column 2 equals key. Appended rows hold the lead's name in
   * column 2, so only rows seeded with the key there can match.
   */
  async updateStatus(key: string, status: string, notes = ''): Promise<UpdateStatusOutput> {
    try {
      const row = await this.table.findInColumn(STATUS_LOOKUP_COLUMN, key);
      if (row === null) {
        return stepFailure('NOT_FOUND', `No row matches ${key}`);
      }

      await this.table.updateCell(row, STATUS_COLUMN, status);
      if (notes) {
        await this.table.updateCell(row, NOTES_COLUMN, notes);
      }
      this.logger.info('Updated lead status', { key, status, row });
      return { success: true, row };
    } catch (error) {
      this.logFailure('updateStatus', error);
      return stepFailure('STORE_ERROR', getErrorMessage(error));
    }
  }

  private logFailure(operation: string, error: unknown, leadId?: string): void {
    const classified = classifyError(error);
    this.logger.storeFailed({
      operation,
      error_code: classified.code,
      error_message: classified.message,
      lead_id: leadId,
    });
  }
}

// ===========================================
// Google Sheets Table
// ===========================================

export type GoogleApiAuth = NonNullable<sheets_v4.Options['auth']>;

export interface GoogleSheetTableConfig {
  auth: GoogleApiAuth;
  /** Spreadsheet id; when absent the spreadsheet is looked up by name */
  spreadsheetId?: string;
  spreadsheetName: string;
}

interface ResolvedSheet {
  spreadsheetId: string;
  title: string;
}

const SPREADSHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';

/**
 * Convert a 1-based column number to its A1 letters (1 -> A, 27 -> AA)
 */
export function columnLetter(column: number): string {
  let letters = '';
  let remaining = column;
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

function cellText(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Turn raw sheet values into records keyed by the header row
 */
export function toRecords(values: ReadonlyArray<ReadonlyArray<unknown>>): LeadRecord[] {
  const [header = [], ...rows] = values;
  const keys = header.map(cellText);

  return rows.map((row) => {
    const record: LeadRecord = {};
    keys.forEach((key, index) => {
      if (key) record[key] = cellText(row[index]);
    });
    return record;
  });
}

/**
 * SheetTable over the first worksheet of a Google spreadsheet
 */
export class GoogleSheetTable implements SheetTable {
  private readonly sheets: sheets_v4.Sheets;
  private resolved: Promise<ResolvedSheet> | null = null;

  constructor(private readonly config: GoogleSheetTableConfig) {
    this.sheets = google.sheets({ version: 'v4', auth: config.auth });
  }

  private resolve(): Promise<ResolvedSheet> {
    if (!this.resolved) {
      this.resolved = this.resolveSheet().catch((error: unknown) => {
        this.resolved = null;
        throw error;
      });
    }
    return this.resolved;
  }

  private async resolveSheet(): Promise<ResolvedSheet> {
    const spreadsheetId = this.config.spreadsheetId ?? (await this.findSpreadsheetId());

    const response = await this.sheets.spreadsheets.get({
      spreadsheetId,
      fields: 'sheets.properties.title',
    });
    const title = response.data.sheets?.[0]?.properties?.title;
    if (!title) {
      throw new Error(`Spreadsheet ${spreadsheetId} has no worksheet`);
    }
    return { spreadsheetId, title };
  }

  private async findSpreadsheetId(): Promise<string> {
    const drive = google.drive({ version: 'v3', auth: this.config.auth });
    const name = this.config.spreadsheetName.replace(/'/g, "\\'");
    const response = await drive.files.list({
      q: `name = '${name}' and mimeType = '${SPREADSHEET_MIME_TYPE}' and trashed = false`,
      fields: 'files(id)',
      pageSize: 1,
    });
    const id = response.data.files?.[0]?.id;
    if (!id) {
      throw new Error(`Spreadsheet '${this.config.spreadsheetName}' not found`);
    }
    return id;
  }

  private range(title: string, a1?: string): string {
    const quoted = `'${title.replace(/'/g, "''")}'`;
    return a1 ? `${quoted}!${a1}` : quoted;
  }

  private async readValues(a1?: string): Promise<unknown[][]> {
    const { spreadsheetId, title } = await this.resolve();
    const response = await this.sheets.spreadsheets.values.get({
      spreadsheetId,
      range: this.range(title, a1),
    });
    return response.data.values ?? [];
  }

  async getHeaderRow(): Promise<string[]> {
    const [header = []] = await this.readValues('1:1');
    return header.map(cellText).filter((value) => value !== '');
  }

  async getAllRecords(): Promise<LeadRecord[]> {
    return toRecords(await this.readValues());
  }

  async appendRow(values: ReadonlyArray<string | number>): Promise<void> {
    const { spreadsheetId, title } = await this.resolve();
    await this.sheets.spreadsheets.values.append({
      spreadsheetId,
      range: this.range(title, 'A1'),
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: [[...values]] },
    });
  }

  async findInColumn(column: number, value: string): Promise<number | null> {
    const letter = columnLetter(column);
    const rows = await this.readValues(`${letter}:${letter}`);
    const index = rows.findIndex((row) => cellText(row[0]) === value);
    return index === -1 ? null : index + 1;
  }

  async updateCell(row: number, column: number, value: string): Promise<void> {
    const { spreadsheetId, title } = await this.resolve();
    await this.sheets.spreadsheets.values.update({
      spreadsheetId,
      range: this.range(title, `${columnLetter(column)}${row}`),
      valueInputOption: 'RAW',
      requestBody: { values: [[value]] },
    });
  }
}
