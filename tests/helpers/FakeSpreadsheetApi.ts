// tests/helpers/FakeSpreadsheetApi.ts

import type { SpreadsheetApi, SpreadsheetInfo } from '../../src/sinks/SpreadsheetApi';

type Method = keyof SpreadsheetApi;

interface ParsedRange {
  tab: string;
  startRow: number;
  startColumn: number;
  endRow?: number;
  endColumn?: number;
}

const RANGE_PATTERN = /^'((?:[^']|'')*)'(?:!([A-Z]+)(\d+)(?::([A-Z]+)(\d+)?)?)?$/;

function columnIndex(letters: string): number {
  let index = 0;
  for (const letter of letters) {
    index = index * 26 + (letter.charCodeAt(0) - 64);
  }
  return index;
}

export function parseRange(range: string): ParsedRange {
  const match = RANGE_PATTERN.exec(range);
  if (!match) throw new Error(`Unsupported range: ${range}`);

  const [, quoted, startColumn, startRow, endColumn, endRow] = match;
  return {
    tab: quoted.replace(/''/g, "'"),
    startRow: startRow ? Number(startRow) : 1,
    startColumn: startColumn ? columnIndex(startColumn) : 1,
    endColumn: endColumn ? columnIndex(endColumn) : undefined,
    endRow: endRow ? Number(endRow) : startColumn && !endColumn ? Number(startRow) : undefined,
  };
}

/**
 * In-memory spreadsheet honouring the A1 ranges the sheets sink sends. Reads
 * drop trailing empty cells and rows the way the real API does.
 */
export class FakeSpreadsheetApi implements SpreadsheetApi {
  readonly tabs = new Map<string, string[][]>();
  readonly calls: Array<{ method: Method; range?: string }> = [];
  beforeCall?: (method: Method, range?: string) => void;

  constructor(readonly title = 'Support export') {}

  seed(tab: string, rows: string[][]): void {
    this.tabs.set(tab, rows.map((row) => [...row]));
  }

  /**
   * Contents of a tab without trailing empty cells or rows.
   */
  rows(tab: string): string[][] {
    return trim(this.tabs.get(tab) ?? []);
  }

  async getSpreadsheet(_spreadsheetId: string): Promise<SpreadsheetInfo> {
    this.record('getSpreadsheet');
    return { title: this.title, tabs: [...this.tabs.keys()] };
  }

  async addTab(_spreadsheetId: string, title: string): Promise<void> {
    this.record('addTab', title);
    if (this.tabs.has(title)) throw new Error(`A sheet with the name "${title}" already exists`);
    this.tabs.set(title, []);
  }

  async getValues(_spreadsheetId: string, range: string): Promise<string[][]> {
    this.record('getValues', range);
    const parsed = parseRange(range);
    const grid = this.grid(parsed.tab);
    const lastRow = parsed.endRow ?? grid.length;

    const values: string[][] = [];
    for (let row = parsed.startRow; row <= lastRow; row++) {
      const cells = grid[row - 1] ?? [];
      const lastColumn = parsed.endColumn ?? cells.length;
      values.push(cells.slice(parsed.startColumn - 1, lastColumn));
    }
    return trim(values);
  }

  async updateValues(_spreadsheetId: string, range: string, values: string[][]): Promise<void> {
    this.record('updateValues', range);
    const parsed = parseRange(range);
    const grid = this.grid(parsed.tab);
    values.forEach((cells, offset) => {
      cells.forEach((cell, column) => setCell(grid, parsed.startRow + offset, parsed.startColumn + column, cell));
    });
  }

  async appendValues(_spreadsheetId: string, range: string, values: string[][]): Promise<void> {
    this.record('appendValues', range);
    const parsed = parseRange(range);
    const grid = this.grid(parsed.tab);
    const start = trim(grid).length + 1;
    values.forEach((cells, offset) => {
      cells.forEach((cell, column) => setCell(grid, start + offset, parsed.startColumn + column, cell));
    });
  }

  async clearValues(_spreadsheetId: string, range: string): Promise<void> {
    this.record('clearValues', range);
    const parsed = parseRange(range);
    const grid = this.grid(parsed.tab);
    const lastRow = parsed.endRow ?? grid.length;
    for (let row = parsed.startRow; row <= lastRow; row++) {
      const cells = grid[row - 1];
      if (!cells) continue;
      const lastColumn = parsed.endColumn ?? cells.length;
      for (let column = parsed.startColumn; column <= lastColumn && column <= cells.length; column++) {
        cells[column - 1] = '';
      }
    }
  }

  private record(method: Method, range?: string): void {
    this.calls.push({ method, range });
    this.beforeCall?.(method, range);
  }

  private grid(tab: string): string[][] {
    const grid = this.tabs.get(tab);
    if (!grid) throw new Error(`Unable to parse range: ${tab}`);
    return grid;
  }
}

function setCell(grid: string[][], row: number, column: number, value: string): void {
  while (grid.length < row) grid.push([]);
  const cells = grid[row - 1];
  while (cells.length < column) cells.push('');
  cells[column - 1] = value;
}

function trim(rows: string[][]): string[][] {
  const trimmed = rows.map((row) => {
    let end = row.length;
    while (end > 0 && row[end - 1] === '') end--;
    return row.slice(0, end);
  });
  while (trimmed.length > 0 && trimmed[trimmed.length - 1].length === 0) trimmed.pop();
  return trimmed;
}
