import { OutputFormat } from '../model/OutputFormat';

export interface SheetLimits {
  excelRowLimit: number;
  excelColumnLimit: number;
}

export class FormatSelector {
  /**
   * Picks xlsx while the dataset fits in one worksheet, csv otherwise.
   * @param rowCount Data rows, header excluded.
   */
  static select(rowCount: number, columnCount: number, limits: SheetLimits): OutputFormat {
    return rowCount > limits.excelRowLimit || columnCount > limits.excelColumnLimit ? 'csv' : 'xlsx';
  }
}
