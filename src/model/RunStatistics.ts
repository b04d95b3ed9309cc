// src/model/RunStatistics.ts
import type { PipelineState } from './PipelineState';

export type ObjectStatus = 'success' | 'failed' | 'cancelled';

export interface ObjectStatistics {
  readonly objectName: string;
  readonly startTime: Date;
  readonly durationMs: number;
  readonly recordCount: number;
  readonly retries: number;
  readonly status: ObjectStatus;
  readonly message: string;
}

export interface StageEvent {
  readonly stage: PipelineState;
  /** File or object the event is about. */
  readonly subject: string;
  readonly startTime: Date;
  readonly durationMs: number;
  readonly recordCount: number;
  readonly success: boolean;
  readonly message: string;
}

export const STATISTICS_COLUMNS = [
  'run_id',
  'timestamp',
  'stage',
  'object',
  'record_count',
  'duration_seconds',
  'retries',
  'status',
  'message',
  'last_refresh_date',
] as const;

export type StatisticsRow = Record<(typeof STATISTICS_COLUMNS)[number], string>;
