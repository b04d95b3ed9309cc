// src/model/RecordSet.ts
import type { CellValue } from './CellValue';

/** One extracted record: column label -> value, in column order. */
export type DataRecord = ReadonlyMap<string, CellValue>;

export interface RecordSet {
  readonly objectName: string;
  readonly columns: readonly string[];
  readonly records: readonly DataRecord[];
}
