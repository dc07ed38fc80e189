import ExcelJS from 'exceljs';
import fs from 'fs-extra';
import path from 'path';
import { UnitResult } from '../types/results.js';
import { logger } from './logger.js';

export const DESCRIPTION_HEADER = 'Query Description';

export interface TimingTable {
  columns: string[];
  /** Description → column → cell text. */
  rows: Map<string, Record<string, string>>;
}

export function timingCell(result: UnitResult): string {
  return result.status === 'SUCCESS' ? result.time.toFixed(3) : 'ERROR';
}

function isCsv(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.csv';
}

export class ResultExporter {
  static async readTable(filePath: string): Promise<TimingTable> {
    const table: TimingTable = { columns: [DESCRIPTION_HEADER], rows: new Map() };
    if (!(await fs.pathExists(filePath))) return table;

    const workbook = new ExcelJS.Workbook();
    let sheet: ExcelJS.Worksheet | undefined;
    if (isCsv(filePath)) {
      // Keep every cell as text; the default mapping turns numbers and date-like descriptions into other types.
      sheet = await workbook.csv.readFile(filePath, { map: (value: unknown) => value });
    } else {
      await workbook.xlsx.readFile(filePath);
      sheet = workbook.worksheets[0];
    }
    if (!sheet || sheet.rowCount === 0) return table;

    const columns: string[] = [];
    sheet.getRow(1).eachCell({ includeEmpty: true }, (cell, col) => {
      columns[col - 1] = cell.text;
    });
    if (columns.length > 0) table.columns = columns;

    for (let r = 2; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      const description = row.getCell(1).text;
      if (!description) continue;
      const record: Record<string, string> = {};
      table.columns.slice(1).forEach((column, i) => {
        const text = row.getCell(i + 2).text;
        if (text !== '') record[column] = text;
      });
      table.rows.set(description, record);
    }

    return table;
  }

  static async writeTable(filePath: string, table: TimingTable) {
    fs.ensureDirSync(path.dirname(filePath));
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Query Timings');

    sheet.addRow(table.columns);
    for (const [description, record] of table.rows) {
      sheet.addRow([description, ...table.columns.slice(1).map(column => record[column] ?? '')]);
    }

    if (isCsv(filePath)) {
      await workbook.csv.writeFile(filePath);
    } else {
      sheet.getRow(1).font = { bold: true };
      sheet.getRow(1).fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FFE0E0E0' },
      };
      await workbook.xlsx.writeFile(filePath);
    }
  }

  /**
   * Adds one run column to the timing table at `filePath`. Rows are matched by description;
   * earlier columns and rows are carried over untouched.
   */
  static async mergeTimings(filePath: string, column: string, results: readonly UnitResult[]): Promise<TimingTable> {
    const table = await this.readTable(filePath);
    if (!table.columns.includes(column)) table.columns.push(column);

    for (const result of results) {
      const record = table.rows.get(result.name) ?? {};
      record[column] = timingCell(result);
      table.rows.set(result.name, record);
    }

    await this.writeTable(filePath, table);
    logger.info({ column, rows: table.rows.size }, `Results saved to: ${filePath}`);
    return table;
  }
}
