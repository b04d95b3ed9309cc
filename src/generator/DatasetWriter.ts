import * as fs from 'fs';
import * as path from 'path';
import { DataSheet } from '../model/DataSheet';
import { OutputConf } from '../model/ExecConf';
import { OutputFormat } from '../model/OutputFormat';
import { PersistenceError, errorMessage } from '../model/PipelineError';
import { RecordSet } from '../model/RecordSet';
import { DatasetMerger } from '../processor/DatasetMerger';
import { CsvGenerator } from './CsvGenerator';
import { ExcelGenerator } from './ExcelGenerator';

const TEMP_SUFFIX = '.tmp';

export interface PersistedFile {
  path: string;
  format: OutputFormat;
  rowCount: number;
}

export class DatasetWriter {
  static fileNameFor(output: Pick<OutputConf, 'fileBaseName'>, format: OutputFormat): string {
    return `${output.fileBaseName}.${format}`;
  }

  /**
   * Writes the merged dataset to `<folder>/<fileBaseName>.<format>`, replacing any previous file.
   * The file is written next to the target and renamed over it, so a failed write leaves the
   * previous file untouched. A file of the other format left by an earlier run is removed.
   * For xlsx with `includeObjectSheets`, one sheet per record set follows the merged sheet.
   * @throws PersistenceError on any file system error.
   */
  static async write(
    dataset: DataSheet,
    recordSets: readonly RecordSet[],
    format: OutputFormat,
    output: OutputConf
  ): Promise<PersistedFile> {
    const filePath = path.resolve(output.folder, this.fileNameFor(output, format));
    const tempPath = `${filePath}${TEMP_SUFFIX}`;

    try {
      // Rendered before the target folder is touched
      const workbook =
        format === 'xlsx'
          ? ExcelGenerator.generateWorkbook(
              output.includeObjectSheets
                ? [dataset, ...recordSets.map(recordSet => DatasetMerger.toDataSheet(recordSet, recordSet.objectName))]
                : [dataset]
            )
          : undefined;

      await fs.promises.mkdir(output.folder, { recursive: true });
      const handle = await fs.promises.open(tempPath, 'w');
      try {
        if (workbook) {
          await handle.writeFile(workbook);
        } else {
          for (const chunk of CsvGenerator.generateCsvChunks(dataset)) {
            await handle.write(chunk, null, 'utf8');
          }
        }
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
      });
      throw new PersistenceError(filePath, error);
    }

    await this.removeStale(output, format);
    console.log(`Data for ${dataset.data.length} records saved to ${filePath}`);
    return { path: filePath, format, rowCount: dataset.data.length };
  }

  /**
   * Deletes the file of the other format, so the folder holds only the current dataset.
   */
  private static async removeStale(output: OutputConf, format: OutputFormat): Promise<void> {
    const stalePath = path.resolve(output.folder, this.fileNameFor(output, format === 'xlsx' ? 'csv' : 'xlsx'));
    try {
      await fs.promises.unlink(stalePath);
      console.log(`Removed ${stalePath} left by an earlier run.`);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      throw new PersistenceError(stalePath, error);
    }
  }
}
