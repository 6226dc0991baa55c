// src/sinks/XlsxFileSink.ts

import ExcelJS from 'exceljs';
import { LocalFileSink } from './LocalFileSink';
import type { SinkKind } from './types';

export const WORKSHEET_NAME = 'Tickets';

/**
 * One worksheet named `Tickets` with a bold header row. The format has no
 * append, so every flush loads the workbook, adds the batch and rewrites it.
 */
export class XlsxFileSink extends LocalFileSink {
  readonly kind: SinkKind = 'xlsx';
  readonly extension = 'xlsx';

  protected async createFile(filePath: string, header: readonly string[]): Promise<void> {
    await this.writeRows(filePath, [[...header]]);
  }

  protected async appendRows(filePath: string, rows: string[][]): Promise<void> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = workbook.getWorksheet(WORKSHEET_NAME) ?? workbook.addWorksheet(WORKSHEET_NAME);
    sheet.addRows(rows);
    await workbook.xlsx.writeFile(filePath);
  }

  protected async readRows(filePath: string): Promise<string[][]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = workbook.getWorksheet(WORKSHEET_NAME);
    if (!sheet) return [];

    const width = sheet.getRow(1).cellCount;
    const rows: string[][] = [];
    sheet.eachRow((row) => {
      const cells: string[] = [];
      for (let column = 1; column <= width; column++) {
        cells.push(row.getCell(column).text);
      }
      rows.push(cells);
    });
    return rows;
  }

  protected async writeRows(filePath: string, rows: string[][]): Promise<void> {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet(WORKSHEET_NAME);
    sheet.addRows(rows);
    sheet.getRow(1).font = { bold: true };
    await workbook.xlsx.writeFile(filePath);
  }
}
