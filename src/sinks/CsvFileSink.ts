// src/sinks/CsvFileSink.ts

import { promises as fs } from 'fs';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { LocalFileSink } from './LocalFileSink';
import type { SinkKind } from './types';

/**
 * UTF-8, comma-separated, one header row. Batches are appended to the file.
 */
export class CsvFileSink extends LocalFileSink {
  readonly kind: SinkKind = 'csv';
  readonly extension = 'csv';

  protected async createFile(filePath: string, header: readonly string[]): Promise<void> {
    await fs.writeFile(filePath, stringify([[...header]]), 'utf8');
  }

  protected async appendRows(filePath: string, rows: string[][]): Promise<void> {
    await fs.appendFile(filePath, stringify(rows), 'utf8');
  }

  protected async readRows(filePath: string): Promise<string[][]> {
    const content = await fs.readFile(filePath, 'utf8');
    const records: unknown = parse(content, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
    return toStringRows(records);
  }

  protected async writeRows(filePath: string, rows: string[][]): Promise<void> {
    await fs.writeFile(filePath, stringify(rows), 'utf8');
  }
}

function toStringRows(records: unknown): string[][] {
  if (!Array.isArray(records)) return [];
  const rows: unknown[] = records;
  return rows.map((record) => {
    if (!Array.isArray(record)) return [];
    const cells: unknown[] = record;
    return cells.map((cell) => (typeof cell === 'string' ? cell : String(cell ?? '')));
  });
}
