// src/model/CellValue.ts

export type CellValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'date'; value: Date }
  | { kind: 'null' };

export const NULL_CELL: CellValue = Object.freeze({ kind: 'null' });

/**
 * Renders a cell as the plain text written to CSV files and log lines.
 * Dates are written as ISO-8601 and nulls as an empty string.
 */
export function cellToText(cell: CellValue): string {
  switch (cell.kind) {
    case 'string':
      return cell.value;
    case 'number':
    case 'boolean':
      return String(cell.value);
    case 'date':
      return cell.value.toISOString();
    case 'null':
      return '';
  }
}

/**
 * Converts a cell to the value handed to the spreadsheet writer.
 */
export function cellToSheetValue(cell: CellValue): string | number | boolean | Date | undefined {
  return cell.kind === 'null' ? undefined : cell.value;
}
