import { google, type Auth, type sheets_v4 } from 'googleapis';
import {
  REQUIRED_COLUMNS,
  ROW_STATUS,
  isClaimableStatus,
  withRetry,
  type FinalRowStatus,
  type Logger,
  type QueueRow,
  type RetryOptions,
} from '@sheetreel/shared';
import { QueueStoreError, type QueueStore } from './queue-store.js';

export interface SheetsQueueStoreOptions {
  auth: Auth.GoogleAuth;
  spreadsheetId: string;
  resultUrlColumn: string;
  /** Defaults to the first worksheet. */
  sheetTitle?: string;
  retry?: RetryOptions;
}

type Column = 'title' | 'script' | 'status' | 'url';

interface SheetLayout {
  sheet: string;
  /** 0-based column index per field */
  columns: Record<Column, number>;
}

/** 0 → A, 25 → Z, 26 → AA */
export function columnLetter(index: number): string {
  let n = index + 1;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/** A1 sheet reference, quoted so titles with spaces or quotes work. */
export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function cellText(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

/** Queue backed by a Google Sheet: header in row 1, one job per row below it. */
export class SheetsQueueStore implements QueueStore {
  private sheets: sheets_v4.Sheets;
  private layout: SheetLayout | null = null;

  constructor(
    private options: SheetsQueueStoreOptions,
    private logger: Logger,
  ) {
    this.sheets = google.sheets({ version: 'v4', auth: options.auth });
  }

  async listRows(): Promise<QueueRow[]> {
    const { title, values } = await this.readSheet();
    const [header = [], ...body] = values;
    const layout = this.mapColumns(title, header.map(cellText));
    this.layout = layout;
    const { columns } = layout;

    const rows: QueueRow[] = [];
    body.forEach((cells, i) => {
      const row: QueueRow = {
        rowNumber: i + 2,
        title: cellText(cells[columns.title]).trim(),
        script: cellText(cells[columns.script]),
        status: cellText(cells[columns.status]),
        resultUrl: cellText(cells[columns.url]),
      };
      // Blank spacer rows are not jobs
      if (!row.title && !row.script.trim()) return;
      rows.push(row);
    });

    this.logger.info({ sheet: title, rows: rows.length }, 'Queue loaded');
    return rows;
  }

  async claimRow(row: QueueRow): Promise<boolean> {
    const statusCell = this.cell(row, 'status');
    const res = await this.call('values.get', () =>
      this.sheets.spreadsheets.values.get({
        spreadsheetId: this.options.spreadsheetId,
        range: statusCell,
      }),
    );

    const current = cellText(res.data.values?.[0]?.[0]);
    if (!isClaimableStatus(current)) {
      this.logger.warn({ row: row.rowNumber, status: current }, 'Row was claimed by another writer');
      return false;
    }

    await this.write(statusCell, ROW_STATUS.PROCESSING);
    return true;
  }

  async markCompleted(row: QueueRow, url: string): Promise<void> {
    await this.call('values.batchUpdate', () =>
      this.sheets.spreadsheets.values.batchUpdate({
        spreadsheetId: this.options.spreadsheetId,
        requestBody: {
          valueInputOption: 'RAW',
          data: [
            { range: this.cell(row, 'status'), values: [[ROW_STATUS.COMPLETED]] },
            { range: this.cell(row, 'url'), values: [[url]] },
          ],
        },
      }),
    );
  }

  async markStatus(row: QueueRow, status: FinalRowStatus): Promise<void> {
    await this.write(this.cell(row, 'status'), status);
  }

  private async write(range: string, value: string): Promise<void> {
    await this.call('values.update', () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId: this.options.spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values: [[value]] },
      }),
    );
  }

  private cell(row: QueueRow, column: 'status' | 'url'): string {
    if (!this.layout) {
      throw new QueueStoreError('Queue layout unknown; listRows() must run first');
    }
    const { sheet, columns } = this.layout;
    return `${quoteSheetTitle(sheet)}!${columnLetter(columns[column])}${row.rowNumber}`;
  }

  private async readSheet(): Promise<{ title: string; values: unknown[][] }> {
    try {
      const title = await this.resolveSheetTitle();
      const res = await this.call('values.get', () =>
        this.sheets.spreadsheets.values.get({
          spreadsheetId: this.options.spreadsheetId,
          range: quoteSheetTitle(title),
        }),
      );
      return { title, values: res.data.values ?? [] };
    } catch (err) {
      if (err instanceof QueueStoreError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new QueueStoreError(`Could not read spreadsheet ${this.options.spreadsheetId}: ${message}`, {
        cause: err,
      });
    }
  }

  private async resolveSheetTitle(): Promise<string> {
    if (this.options.sheetTitle) return this.options.sheetTitle;

    const res = await this.call('spreadsheets.get', () =>
      this.sheets.spreadsheets.get({
        spreadsheetId: this.options.spreadsheetId,
        fields: 'sheets.properties.title',
      }),
    );
    const title = res.data.sheets?.[0]?.properties?.title;
    if (!title) {
      throw new QueueStoreError(`Spreadsheet ${this.options.spreadsheetId} has no worksheets`);
    }
    return title;
  }

  private mapColumns(title: string, header: string[]): SheetLayout {
    const names = header.map((h) => h.trim());
    const find = (name: string): number => {
      const idx = names.indexOf(name);
      if (idx < 0) {
        throw new QueueStoreError(`Sheet "${title}" is missing the "${name}" column`);
      }
      return idx;
    };

    const [titleName, scriptName, statusName] = REQUIRED_COLUMNS;
    return {
      sheet: title,
      columns: {
        title: find(titleName),
        script: find(scriptName),
        status: find(statusName),
        url: find(this.options.resultUrlColumn),
      },
    };
  }

  private call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, this.logger, `sheets ${label}`, this.options.retry);
  }
}
