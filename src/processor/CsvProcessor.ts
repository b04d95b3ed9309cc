import * as Papa from 'papaparse';

export class CsvProcessor {
  /**
   * Generates a CSV string from headers and data using PapaParse.
   * Fields containing the delimiter, quotes or line breaks are quoted.
   * @param headers The header row; omitted when empty.
   * @param data The data rows for the CSV file.
   */
  static generateCSV(headers: readonly string[], data: readonly (readonly string[])[]): string {
    const csvData = headers.length > 0 ? [[...headers], ...data.map(row => [...row])] : data.map(row => [...row]);

    return Papa.unparse(csvData, {
      quotes: false, // Quote only when needed
      delimiter: ',',
      newline: '\n',
    });
  }
}
