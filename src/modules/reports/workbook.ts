import { Workbook } from 'exceljs';
import type { Table } from '../impact/tables';

export type WorkbookSheet = {
  name: string;
  table: Table;
};

export const SHEET_NAMES = {
  groupImpact: 'Group Impact',
  oaSummary: 'OA Summary',
  oaDetails: 'OA Details',
} as const;

function addTableSheet(workbook: Workbook, { name, table }: WorkbookSheet) {
  const sheet = workbook.addWorksheet(name);
  sheet.addRow(table.columns);
  sheet.getRow(1).font = { bold: true };
  for (const row of table.rows) {
    sheet.addRow(row);
  }

  table.columns.forEach((column, i) => {
    const widest = table.rows.reduce((max, row) => Math.max(max, String(row[i] ?? '').length), column.length);
    sheet.getColumn(i + 1).width = Math.min(widest + 2, 80);
  });
}

/**
 * One worksheet per table, header row first. An empty table still yields its header row.
 */
export async function buildWorkbook(sheets: readonly WorkbookSheet[]): Promise<ArrayBuffer> {
  const workbook = new Workbook();
  workbook.creator = 'change-impact-api';
  workbook.created = new Date();
  sheets.forEach((sheet) => addTableSheet(workbook, sheet));
  return workbook.xlsx.writeBuffer();
}
