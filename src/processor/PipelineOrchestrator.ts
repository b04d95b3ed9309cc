import * as fs from 'fs';
import * as path from 'path';
import { DataSheet } from '../model/DataSheet';
import { ExecConf } from '../model/ExecConf';
import { ObjectConf } from '../model/ObjectConf';
import { OUTPUT_MIME_TYPES } from '../model/OutputFormat';
import {
  ExtractionError,
  PersistenceError,
  PipelineError,
  SyncError,
  errorMessage,
} from '../model/PipelineError';
import { PipelineState, canTransition } from '../model/PipelineState';
import { RecordSet } from '../model/RecordSet';
import { RemoteFile, RemoteTarget } from '../model/RemoteTarget';
import { ObjectStatus } from '../model/RunStatistics';
import { DriveConnector } from '../drive/DriveClient';
import { DriveSynchronizer } from '../drive/DriveSynchronizer';
import { DatasetWriter, PersistedFile } from '../generator/DatasetWriter';
import { ExecConfReader } from '../reader/ExecConfReader';
import { ObjectExtractor } from '../salesforce/ObjectExtractor';
import { SalesforceConnector, SalesforceSource } from '../salesforce/SalesforceSource';
import { StatisticsCollector } from '../statistics/StatisticsCollector';
import { DatasetMerger } from './DatasetMerger';
import { FormatSelector } from './FormatSelector';
import { RetryExecutor, RetryOptions, Sleep } from './RetryExecutor';
import { TaskPool } from './TaskPool';

const SALESFORCE_LOGIN = 'Salesforce login';

export interface PipelineDependencies {
  salesforce: SalesforceConnector;
  drive: DriveConnector;
  sleep?: Sleep;
  now?: () => Date;
}

export interface RunOutcome {
  state: 'DONE' | 'FAILED';
  failedStage?: PipelineState;
  error?: unknown;
  dataset?: DataSheet;
  persistedFile?: PersistedFile;
  remoteFile?: RemoteFile;
  statistics: StatisticsCollector;
}

type ExtractionOutcome = { ok: true; recordSet: RecordSet } | { ok: false; error: ExtractionError };

export class PipelineOrchestrator {
  private readonly execConf: ExecConf;
  private readonly dependencies: PipelineDependencies;
  private readonly now: () => Date;
  private state: PipelineState = 'INIT';

  constructor(execConf: ExecConf, dependencies: PipelineDependencies) {
    this.execConf = execConf;
    this.dependencies = dependencies;
    this.now = dependencies.now ?? (() => new Date());
  }

  get currentState(): PipelineState {
    return this.state;
  }

  get statisticsLogPath(): string {
    return path.resolve(this.execConf.output.folder, this.execConf.output.statisticsLogName);
  }

  /**
   * Runs INIT → EXTRACTING → MERGING → PERSISTING → SYNCING → REPORTING → DONE.
   * Any unrecovered error moves the run to FAILED; the statistics log is written in both cases.
   * Never throws: the outcome carries the failure.
   */
  async run(): Promise<RunOutcome> {
    if (this.state !== 'INIT') {
      throw new Error(`Pipeline already ran (state ${this.state})`);
    }
    const statistics = new StatisticsCollector(this.now);
    const objectOrder = this.execConf.objects.map(objectConf => objectConf.name);
    const outcome: Partial<RunOutcome> = {};

    try {
      await this.initialize();

      this.transition('EXTRACTING');
      const recordSets = await this.extractAll(statistics);

      this.transition('MERGING');
      outcome.dataset = DatasetMerger.merge(recordSets);
      console.log(`Merged ${outcome.dataset.data.length} rows from ${recordSets.length} objects.`);

      this.transition('PERSISTING');
      outcome.persistedFile = await this.persist(outcome.dataset, recordSets, statistics);

      this.transition('SYNCING');
      if (this.execConf.drive.enabled) {
        outcome.remoteFile = await this.upload(outcome.persistedFile, statistics);
      } else {
        console.log('Upload disabled, skipping Google Drive synchronization.');
      }

      this.transition('REPORTING');
      await statistics.flush(this.statisticsLogPath, objectOrder, { finalState: 'DONE' });

      this.transition('DONE');
      console.log('Pipeline completed successfully!');
      return { ...outcome, state: 'DONE', statistics };
    } catch (error) {
      const failedStage = this.currentState;
      this.transition('FAILED');
      console.error(`Pipeline failed during ${failedStage}: ${errorMessage(error)}`);

      if (failedStage !== 'REPORTING') {
        try {
          await statistics.flush(this.statisticsLogPath, objectOrder, { finalState: 'FAILED', failedStage, error });
        } catch (flushError) {
          console.error(`Could not write the statistics log: ${errorMessage(flushError)}`);
        }
      }
      return { ...outcome, state: 'FAILED', failedStage, error, statistics };
    }
  }

  private transition(next: PipelineState): void {
    if (!canTransition(this.state, next)) {
      throw new Error(`Illegal pipeline transition ${this.state} -> ${next}`);
    }
    this.state = next;
  }

  private async initialize(): Promise<void> {
    ExecConfReader.validateResources(this.execConf);
    try {
      await fs.promises.mkdir(this.execConf.output.folder, { recursive: true });
    } catch (error) {
      throw new PersistenceError(path.resolve(this.execConf.output.folder), error);
    }
  }

  private retryOptions(signal?: AbortSignal): RetryOptions {
    return {
      ...RetryExecutor.optionsFrom(this.execConf.appConfiguration.retry),
      signal,
      sleep: this.dependencies.sleep,
    };
  }

  /**
   * Extracts every configured object with bounded concurrency and joins the results in configured order.
   * An exhausted object is skipped under the `continue` policy; under `abort`, or when the failure is
   * fatal (rejected session), in-flight siblings are cancelled and the run fails.
   */
  private async extractAll(statistics: StatisticsCollector): Promise<RecordSet[]> {
    const loginStart = this.now();
    let source: SalesforceSource;
    try {
      source = await RetryExecutor.execute(SALESFORCE_LOGIN, () => this.dependencies.salesforce.connect(), this.retryOptions());
    } catch (error) {
      statistics.recordStage({
        stage: 'EXTRACTING',
        subject: SALESFORCE_LOGIN,
        startTime: loginStart,
        durationMs: this.now().getTime() - loginStart.getTime(),
        recordCount: 0,
        success: false,
        message: errorMessage(error),
      });
      throw error;
    }

    const controller = new AbortController();
    const { concurrency, failurePolicy } = this.execConf.appConfiguration;
    const outcomes = await TaskPool.runAll(this.execConf.objects, concurrency, objectConf =>
      this.extractObject(objectConf, source, statistics, controller)
    );

    const failures = outcomes.flatMap(result => (result.ok ? [] : [result.error]));
    const fatal = failures.find(error => error.disposition === 'fatal');
    if (fatal) {
      throw fatal;
    }
    if (failures.length > 0 && failurePolicy === 'abort') {
      throw failures.find(error => statistics.objectStatistics(error.objectName)?.status === 'failed') ?? failures[0];
    }

    const recordSets = outcomes.flatMap(result => (result.ok ? [result.recordSet] : []));
    if (recordSets.length === 0) {
      throw new PipelineError('EXTRACTION_ERROR', 'No object could be extracted');
    }
    if (failures.length > 0) {
      console.warn(`Continuing without ${failures.map(error => error.objectName).join(', ')}.`);
    }
    return recordSets;
  }

  private async extractObject(
    objectConf: ObjectConf,
    source: SalesforceSource,
    statistics: StatisticsCollector,
    controller: AbortController
  ): Promise<ExtractionOutcome> {
    const startTime = this.now();
    let retries = 0;
    const finish = (status: ObjectStatus, recordCount: number, message: string) => {
      statistics.recordObject({
        objectName: objectConf.name,
        startTime,
        durationMs: this.now().getTime() - startTime.getTime(),
        recordCount,
        retries,
        status,
        message,
      });
    };

    console.log(`\nProcessing object: ${objectConf.name}`);
    try {
      const recordSet = await RetryExecutor.execute(
        objectConf.name,
        () => ObjectExtractor.extract(this.execConf, objectConf, source),
        {
          ...this.retryOptions(controller.signal),
          onRetry: () => {
            retries++;
          },
        }
      );
      if (controller.signal.aborted) {
        // A sibling failed the run while this query was in flight; its result is discarded.
        finish('cancelled', 0, 'Cancelled after a fatal failure in another object');
        return { ok: false, error: new ExtractionError(objectConf.name, controller.signal.reason, retries + 1, 'permanent') };
      }
      finish('success', recordSet.records.length, '');
      console.log(`Data for ${objectConf.name} extracted: ${recordSet.records.length} records.`);
      return { ok: true, recordSet };
    } catch (error) {
      const extractionError = error instanceof ExtractionError ? error : new ExtractionError(objectConf.name, error);
      const cancelled = controller.signal.aborted && extractionError.disposition !== 'fatal';
      finish(cancelled ? 'cancelled' : 'failed', 0, errorMessage(extractionError));
      console.error(`Error processing ${objectConf.name}: ${extractionError.message}`);

      if (!cancelled && (extractionError.disposition === 'fatal' || this.execConf.appConfiguration.failurePolicy === 'abort')) {
        controller.abort(extractionError);
      }
      return { ok: false, error: extractionError };
    }
  }

  private async persist(dataset: DataSheet, recordSets: RecordSet[], statistics: StatisticsCollector): Promise<PersistedFile> {
    const format = FormatSelector.select(dataset.data.length, dataset.columnNames.length, this.execConf.output);
    const fileName = DatasetWriter.fileNameFor(this.execConf.output, format);
    const startTime = this.now();
    try {
      const persisted = await DatasetWriter.write(dataset, recordSets, format, this.execConf.output);
      statistics.recordStage({
        stage: 'PERSISTING',
        subject: fileName,
        startTime,
        durationMs: this.now().getTime() - startTime.getTime(),
        recordCount: persisted.rowCount,
        success: true,
        message: `Saved as ${format}`,
      });
      return persisted;
    } catch (error) {
      statistics.recordStage({
        stage: 'PERSISTING',
        subject: fileName,
        startTime,
        durationMs: this.now().getTime() - startTime.getTime(),
        recordCount: 0,
        success: false,
        message: errorMessage(error),
      });
      throw error;
    }
  }

  private async upload(persisted: PersistedFile, statistics: StatisticsCollector): Promise<RemoteFile> {
    const target: RemoteTarget = {
      folderName: this.execConf.drive.folderName,
      parentFolderId: this.execConf.drive.parentFolderId,
      fileName: path.basename(persisted.path),
    };
    const startTime = this.now();
    try {
      const client = await this.dependencies.drive.connect();
      const remoteFile = await DriveSynchronizer.sync(client, persisted.path, target, OUTPUT_MIME_TYPES[persisted.format]);
      statistics.recordStage({
        stage: 'SYNCING',
        subject: target.fileName,
        startTime,
        durationMs: this.now().getTime() - startTime.getTime(),
        recordCount: persisted.rowCount,
        success: true,
        message: `File '${target.fileName}' ${remoteFile.created ? 'uploaded' : 'updated'} successfully.`,
      });
      return remoteFile;
    } catch (error) {
      const syncError = error instanceof SyncError ? error : new SyncError(target, error);
      statistics.recordStage({
        stage: 'SYNCING',
        subject: target.fileName,
        startTime,
        durationMs: this.now().getTime() - startTime.getTime(),
        recordCount: 0,
        success: false,
        message: syncError.message,
      });
      throw syncError;
    }
  }
}
