import * as XLSX from 'xlsx';
import { cellToSheetValue } from '../model/CellValue';
import { DataSheet } from '../model/DataSheet';

const MAX_SHEET_NAME_LENGTH = 31;
// SheetJS rejects longer text cells; Salesforce long text areas go up to 131,072.
export const MAX_CELL_TEXT_LENGTH = 32767;
const INVALID_SHEET_NAME_CHARS = /[\\/?*[\]:]/g;

export class ExcelGenerator {
  /**
   * Builds an xlsx workbook with one worksheet per DataSheet, in the given order.
   * Sheet names are made valid for Excel and unique within the workbook; text longer than
   * an Excel cell holds is cut to MAX_CELL_TEXT_LENGTH.
   */
  static generateWorkbook(sheets: readonly DataSheet[]): Buffer {
    const workbook = XLSX.utils.book_new();
    const usedNames = new Set<string>();

    for (const dataSheet of sheets) {
      const sheetName = this.sheetNameFor(dataSheet.name, usedNames);
      const worksheetData: (string | number | boolean | Date | undefined)[][] = [];
      worksheetData.push([...dataSheet.columnNames]);
      let truncated = 0;
      for (const row of dataSheet.data) {
        worksheetData.push(
          row.map(cell => {
            const value = cellToSheetValue(cell);
            if (typeof value === 'string' && value.length > MAX_CELL_TEXT_LENGTH) {
              truncated++;
              return value.slice(0, MAX_CELL_TEXT_LENGTH);
            }
            return value;
          })
        );
      }
      if (truncated > 0) {
        console.warn(`${truncated} cell(s) in sheet '${sheetName}' cut to ${MAX_CELL_TEXT_LENGTH} characters.`);
      }

      const worksheet = XLSX.utils.aoa_to_sheet(worksheetData, { cellDates: true });
      XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);
    }

    const content: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    return content;
  }

  /**
   * Worksheet name for an object: `__c` dropped, underscores turned into spaces,
   * characters Excel refuses removed, cut to 31 characters, and suffixed when already taken.
   */
  static sheetNameFor(name: string, usedNames: Set<string>): string {
    const base =
      name
        .replace(/__c$/i, '')
        .replace(/_/g, ' ')
        .replace(INVALID_SHEET_NAME_CHARS, '')
        .trim()
        .slice(0, MAX_SHEET_NAME_LENGTH) || 'Sheet';

    let candidate = base;
    for (let n = 2; usedNames.has(candidate.toLowerCase()); n++) {
      const suffix = ` (${n})`;
      candidate = base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length) + suffix;
    }
    usedNames.add(candidate.toLowerCase());
    return candidate;
  }
}
