/**
 * Daily Weather Archive — Spreadsheet Export
 *
 * One sheet, header row, exactly the table columns. Missing values are empty cells.
 */

import * as XLSX from 'xlsx';
import { TABLE_COLUMNS, toTableRows } from './report';
import type { DailyRecord } from './types';

export const SHEET_NAME = 'meteo_journalier';

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

function toSheet(records: readonly DailyRecord[]): XLSX.WorkSheet {
    return XLSX.utils.json_to_sheet(toTableRows(records), { header: [...TABLE_COLUMNS] });
}

export function toWorkbookBuffer(records: readonly DailyRecord[]): Buffer {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, toSheet(records), SHEET_NAME);
    const out: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    return out;
}

export function toCsv(records: readonly DailyRecord[]): string {
    return XLSX.utils.sheet_to_csv(toSheet(records));
}
