import { cellToText } from '../model/CellValue';
import { DataSheet } from '../model/DataSheet';
import { CsvProcessor } from '../processor/CsvProcessor';

const DEFAULT_CHUNK_ROWS = 10000;

export class CsvGenerator {
  /**
   * Renders a DataSheet as CSV text in chunks of `chunkRows` rows, so large sheets can be
   * written without building one string for the whole file. The first chunk carries the header;
   * every chunk ends with a line break.
   */
  static *generateCsvChunks(dataSheet: DataSheet, chunkRows: number = DEFAULT_CHUNK_ROWS): Generator<string> {
    yield CsvProcessor.generateCSV(dataSheet.columnNames, []) + '\n';

    for (let start = 0; start < dataSheet.data.length; start += chunkRows) {
      const rows = dataSheet.data.slice(start, start + chunkRows).map(row => row.map(cellToText));
      yield CsvProcessor.generateCSV([], rows) + '\n';
    }
  }
}
