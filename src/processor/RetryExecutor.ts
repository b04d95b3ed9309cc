import { ErrorDisposition, ExtractionError, errorMessage } from '../model/PipelineError';
import { RetryConf } from '../model/AppConfiguration';
import { classifyError } from '../salesforce/ErrorClassifier';

const MS_IN_SEC = 1000;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  /** Called before each backoff wait, with the attempt that just failed. */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  sleep?: Sleep;
}

/**
 * Resolves after `ms`, or rejects with the signal's reason as soon as it aborts.
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class RetryExecutor {
  static optionsFrom(retry: RetryConf): RetryOptions {
    return {
      maxAttempts: retry.maxAttempts,
      baseDelayMs: retry.baseDelaySec * MS_IN_SEC,
      maxDelayMs: retry.maxDelaySec * MS_IN_SEC,
    };
  }

  /**
   * Exponential backoff, capped: base, 2*base, 4*base ... never above maxDelayMs.
   * @param attempt The 1-based attempt that failed.
   */
  static delayFor(attempt: number, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>): number {
    return Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
  }

  /**
   * Runs `operation` until it succeeds, fails with a non-retryable error, or uses up `maxAttempts`.
   * @param label The object (or step) name reported in the resulting ExtractionError.
   * @throws ExtractionError carrying the attempt count and the last underlying cause.
   */
  static async execute<T>(label: string, operation: () => Promise<T>, options: RetryOptions): Promise<T> {
    const sleep = options.sleep ?? abortableSleep;
    let attempt = 0;

    for (;;) {
      if (options.signal?.aborted) {
        throw new ExtractionError(label, options.signal.reason ?? new Error('Cancelled'), attempt, 'permanent');
      }
      attempt++;
      try {
        return await operation();
      } catch (error) {
        const cause = error instanceof ExtractionError ? (error.cause ?? error) : error;
        const disposition: ErrorDisposition = classifyError(error);
        if (disposition !== 'retryable' || attempt >= options.maxAttempts) {
          throw new ExtractionError(label, cause, attempt, disposition);
        }

        const delayMs = this.delayFor(attempt, options);
        console.warn(
          `Attempt ${attempt}/${options.maxAttempts} for ${label} failed: ${errorMessage(cause)}. Retrying in ${(delayMs / MS_IN_SEC).toFixed(2)} seconds...`
        );
        options.onRetry?.(attempt, delayMs, cause);
        try {
          await sleep(delayMs, options.signal);
        } catch (abortReason) {
          throw new ExtractionError(label, abortReason ?? cause, attempt, 'permanent');
        }
      }
    }
  }
}
