import { CellValue, NULL_CELL } from '../model/CellValue';
import { DataSheet, SOURCE_OBJECT_COLUMN } from '../model/DataSheet';
import { RecordSet } from '../model/RecordSet';

export const MERGED_SHEET_NAME = 'All Data';

export class DatasetMerger {
  /**
   * Concatenates record sets into one table.
   * Columns are the union of all labels in first-seen order, followed by `source_object`;
   * rows keep the order of `recordSets` and, within each, the source order. Missing cells are null.
   */
  static merge(recordSets: readonly RecordSet[], name: string = MERGED_SHEET_NAME): DataSheet {
    const columnNames: string[] = [];
    const seen = new Set<string>();
    for (const recordSet of recordSets) {
      for (const column of recordSet.columns) {
        if (!seen.has(column)) {
          seen.add(column);
          columnNames.push(column);
        }
      }
    }

    const data: CellValue[][] = [];
    for (const recordSet of recordSets) {
      const sourceCell: CellValue = { kind: 'string', value: recordSet.objectName };
      for (const record of recordSet.records) {
        const row = columnNames.map(column => record.get(column) ?? NULL_CELL);
        row.push(sourceCell);
        data.push(row);
      }
    }

    return Object.freeze({
      name,
      columnNames: Object.freeze([...columnNames, SOURCE_OBJECT_COLUMN]),
      data: Object.freeze(data),
    });
  }

  /**
   * One record set as a sheet of its own, without the `source_object` column.
   */
  static toDataSheet(recordSet: RecordSet, name: string): DataSheet {
    return Object.freeze({
      name,
      columnNames: recordSet.columns,
      data: recordSet.records.map(record => recordSet.columns.map(column => record.get(column) ?? NULL_CELL)),
    });
  }
}
