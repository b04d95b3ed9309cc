// src/model/DataSheet.ts
import type { CellValue } from './CellValue';

export const SOURCE_OBJECT_COLUMN = 'source_object';

export interface DataSheet {
  readonly name: string;
  readonly columnNames: readonly string[];
  readonly data: readonly (readonly CellValue[])[];
}
