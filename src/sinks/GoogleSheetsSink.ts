// src/sinks/GoogleSheetsSink.ts

import { BaseSink, BatchingRowWriter } from './BaseSink';
import { HEADER, PersistentDataset } from '../core/dataset/RowCodec';
import type { SpreadsheetApi, SpreadsheetInfo } from './SpreadsheetApi';
import { quoteTab } from './SpreadsheetApi';
import type { FlushTarget, SinkDeps, SinkKind, WriteMode, WriteSummary } from './types';
import { columnLetter, formatTimestamp } from './naming';

export const DEFAULT_SHEETS_BATCH_SIZE = 1000;

// Last column a Google sheet can have
const LAST_COLUMN = 'ZZZ';

export interface GoogleSheetsSinkOptions {
  spreadsheetId: string;
  tab?: string; // default 'Tickets'
  batchSize?: number;
  now?: () => Date;
}

export interface DestinationCheck extends SpreadsheetInfo {
  tabExists: boolean;
}

/**
 * A tab of a Google spreadsheet. Each flush is a single values call for the
 * whole batch. Overwrite writes the rows below the header in order and then
 * clears every cell outside the written block, so the tab ends up equal to
 * the dataset and repeating it leaves the tab unchanged.
 */
export class GoogleSheetsSink extends BaseSink {
  readonly kind: SinkKind = 'sheets';
  readonly spreadsheetId: string;
  readonly tab: string;
  private readonly now: () => Date;

  constructor(
    deps: SinkDeps,
    private api: SpreadsheetApi,
    options: GoogleSheetsSinkOptions
  ) {
    super(deps, { batchSize: options.batchSize ?? DEFAULT_SHEETS_BATCH_SIZE });
    this.spreadsheetId = options.spreadsheetId;
    this.tab = options.tab ?? 'Tickets';
    this.now = options.now ?? (() => new Date());
  }

  get destinationId(): string {
    return `sheets:${this.spreadsheetId}/${this.tab}`;
  }

  describe(): string {
    return this.location(this.tab);
  }

  /**
   * Confirms the acting identity can open the spreadsheet.
   */
  async verify(): Promise<DestinationCheck> {
    return this.wrap('verify', this.describe(), async () => {
      const info = await this.api.getSpreadsheet(this.spreadsheetId);
      return { ...info, tabExists: info.tabs.includes(this.tab) };
    });
  }

  protected async openTarget(mode: WriteMode): Promise<FlushTarget> {
    switch (mode) {
      case 'create-new': {
        const title = await this.createFreshTab();
        return this.appendTarget(title);
      }
      case 'append-existing':
        await this.ensureTab(this.tab, HEADER);
        return this.appendTarget(this.tab);
      case 'overwrite-destination':
        return this.overwriteTarget(this.tab, HEADER);
    }
  }

  protected async loadDataset(): Promise<PersistentDataset | null> {
    const info = await this.api.getSpreadsheet(this.spreadsheetId);
    if (!info.tabs.includes(this.tab)) return null;

    const [header, ...rows] = await this.api.getValues(this.spreadsheetId, quoteTab(this.tab));
    if (!header || header.length === 0) return null;

    // Sheets drops trailing empty cells
    const width = header.length;
    return {
      header,
      rows: rows.map((row) => (row.length >= width ? row : [...row, ...new Array<string>(width - row.length).fill('')])),
    };
  }

  protected async storeDataset(dataset: PersistentDataset): Promise<WriteSummary> {
    const target = await this.overwriteTarget(this.tab, dataset.header);
    const writer = new BatchingRowWriter(target, 'overwrite-destination', this.kind, this.batchSize, this.deps);
    for (const row of dataset.rows) {
      await writer.writeCells(row);
    }
    return writer.close();
  }

  private appendTarget(title: string): FlushTarget {
    const range = `${quoteTab(title)}!A1`;
    return {
      location: this.location(title),
      flush: (rows) => this.api.appendValues(this.spreadsheetId, range, rows),
    };
  }

  private async overwriteTarget(title: string, header: readonly string[]): Promise<FlushTarget> {
    const tab = quoteTab(title);
    const created = await this.ensureTab(title, header);
    if (!created) {
      await this.api.updateValues(this.spreadsheetId, `${tab}!A1:${columnLetter(header.length)}1`, [[...header]]);
    }

    let nextRow = 2;
    let width = header.length;
    return {
      location: this.location(title),
      flush: async (rows) => {
        width = Math.max(width, ...rows.map((row) => row.length));
        const lastRow = nextRow + rows.length - 1;
        await this.api.updateValues(this.spreadsheetId, `${tab}!A${nextRow}:${columnLetter(width)}${lastRow}`, rows);
        nextRow = lastRow + 1;
      },
      finish: async () => {
        // Leftovers of a wider or longer tab: below the last row, then right of the written columns
        await this.api.clearValues(this.spreadsheetId, `${tab}!A${nextRow}:${LAST_COLUMN}`);
        await this.api.clearValues(
          this.spreadsheetId,
          `${tab}!${columnLetter(width + 1)}1:${LAST_COLUMN}${nextRow - 1}`
        );
      },
    };
  }

  /**
   * Creates the tab with a header row when it is missing, and writes the
   * header into an existing but empty tab. Resolves true when it wrote the header.
   */
  private async ensureTab(title: string, header: readonly string[]): Promise<boolean> {
    const tab = quoteTab(title);
    const headerRange = `${tab}!A1:${columnLetter(header.length)}1`;
    const info = await this.api.getSpreadsheet(this.spreadsheetId);

    if (!info.tabs.includes(title)) {
      await this.api.addTab(this.spreadsheetId, title);
      await this.api.updateValues(this.spreadsheetId, headerRange, [[...header]]);
      this.deps.logger.info('Created spreadsheet tab', { spreadsheetId: this.spreadsheetId, tab: title });
      return true;
    }

    const [firstRow] = await this.api.getValues(this.spreadsheetId, headerRange);
    if (!firstRow || firstRow.every((cell) => cell === '')) {
      await this.api.updateValues(this.spreadsheetId, headerRange, [[...header]]);
      return true;
    }
    return false;
  }

  private async createFreshTab(): Promise<string> {
    const info = await this.api.getSpreadsheet(this.spreadsheetId);
    const base = `${this.tab} ${formatTimestamp(this.now())}`;
    let title = base;
    for (let n = 2; info.tabs.includes(title); n++) {
      title = `${base} (${n})`;
    }

    await this.api.addTab(this.spreadsheetId, title);
    await this.api.updateValues(this.spreadsheetId, `${quoteTab(title)}!A1:${columnLetter(HEADER.length)}1`, [
      [...HEADER],
    ]);
    return title;
  }

  private location(title: string): string {
    return `${this.spreadsheetId}/${title}`;
  }
}
