import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { PersistenceError, errorMessage } from '../model/PipelineError';
import { PipelineState } from '../model/PipelineState';
import {
  ObjectStatistics,
  STATISTICS_COLUMNS,
  StageEvent,
  StatisticsRow,
} from '../model/RunStatistics';
import { CsvProcessor } from '../processor/CsvProcessor';

const MS_IN_SEC = 1000;
const ALL_OBJECTS = '*';

export interface RunSummary {
  finalState: 'DONE' | 'FAILED';
  failedStage?: PipelineState;
  error?: unknown;
}

/**
 * Per-run accumulator for the operations log.
 * Each object's slot is written once, by the task that extracted it.
 */
export class StatisticsCollector {
  readonly runId: string;
  readonly startTime: Date;
  private readonly now: () => Date;
  private readonly objectSlots = new Map<string, ObjectStatistics>();
  private readonly stageEvents: StageEvent[] = [];

  constructor(now: () => Date = () => new Date(), runId: string = randomUUID()) {
    this.now = now;
    this.runId = runId;
    this.startTime = now();
  }

  recordObject(statistics: ObjectStatistics): void {
    if (this.objectSlots.has(statistics.objectName)) {
      throw new Error(`Statistics for ${statistics.objectName} were already recorded`);
    }
    this.objectSlots.set(statistics.objectName, Object.freeze({ ...statistics }));
  }

  recordStage(event: StageEvent): void {
    this.stageEvents.push(Object.freeze({ ...event }));
  }

  objectStatistics(objectName: string): ObjectStatistics | undefined {
    return this.objectSlots.get(objectName);
  }

  /**
   * Object slots in the given order; objects with no slot are left out.
   */
  objects(order: readonly string[]): ObjectStatistics[] {
    return order.flatMap(name => {
      const slot = this.objectSlots.get(name);
      return slot ? [slot] : [];
    });
  }

  get events(): readonly StageEvent[] {
    return this.stageEvents;
  }

  get totalRecords(): number {
    let total = 0;
    for (const slot of this.objectSlots.values()) {
      total += slot.recordCount;
    }
    return total;
  }

  /**
   * Rows appended to the log for this run: objects, stage events, then one summary row.
   */
  toRows(order: readonly string[], summary: RunSummary): StatisticsRow[] {
    const finishedAt = this.now();
    const lastRefreshDate = this.startTime.toISOString().slice(0, 10);

    const row = (
      timestamp: Date,
      stage: string,
      subject: string,
      recordCount: number,
      durationMs: number,
      retries: number,
      status: string,
      message: string
    ): StatisticsRow => ({
      run_id: this.runId,
      timestamp: timestamp.toISOString(),
      stage,
      object: subject,
      record_count: String(recordCount),
      duration_seconds: (durationMs / MS_IN_SEC).toFixed(3),
      retries: String(retries),
      status,
      message,
      last_refresh_date: lastRefreshDate,
    });

    const rows: StatisticsRow[] = [];
    const known = new Set(order);
    const ordered = [...this.objects(order), ...[...this.objectSlots.values()].filter(slot => !known.has(slot.objectName))];
    for (const slot of ordered) {
      rows.push(row(slot.startTime, 'EXTRACTING', slot.objectName, slot.recordCount, slot.durationMs, slot.retries, slot.status, slot.message));
    }
    for (const event of this.stageEvents) {
      rows.push(
        row(event.startTime, event.stage, event.subject, event.recordCount, event.durationMs, 0, event.success ? 'success' : 'failed', event.message)
      );
    }

    const totalRetries = [...this.objectSlots.values()].reduce((sum, slot) => sum + slot.retries, 0);
    rows.push(
      row(
        this.startTime,
        summary.finalState === 'FAILED' ? (summary.failedStage ?? 'FAILED') : 'DONE',
        ALL_OBJECTS,
        this.totalRecords,
        finishedAt.getTime() - this.startTime.getTime(),
        totalRetries,
        summary.finalState === 'DONE' ? 'success' : 'failed',
        summary.error === undefined ? '' : errorMessage(summary.error)
      )
    );
    return rows;
  }

  /**
   * Appends this run's rows to the CSV log, writing the header first when the file is new or empty.
   * Existing rows are never rewritten.
   * @throws PersistenceError when the log cannot be written.
   */
  async flush(logPath: string, order: readonly string[], summary: RunSummary): Promise<void> {
    const rows = this.toRows(order, summary);
    const lines = rows.map(row => STATISTICS_COLUMNS.map(column => row[column]));

    try {
      await fs.promises.mkdir(path.dirname(logPath), { recursive: true });
      const isNew = await this.isMissingOrEmpty(logPath);
      const content = CsvProcessor.generateCSV(isNew ? STATISTICS_COLUMNS : [], lines) + '\n';
      await fs.promises.appendFile(logPath, content, 'utf8');
    } catch (error) {
      throw new PersistenceError(logPath, error);
    }
    console.log(`Statistics saved to ${logPath}`);
  }

  private async isMissingOrEmpty(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(filePath);
      return stats.size === 0;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return true;
      }
      throw error;
    }
  }
}
