// src/model/AppConfiguration.ts

export type FailurePolicy = 'continue' | 'abort';

export interface RetryConf {
  readonly maxAttempts: number;
  readonly baseDelaySec: number;
  readonly maxDelaySec: number;
}

export class AppConfiguration {
  readonly apiVersion: string;
  readonly concurrency: number;
  readonly failurePolicy: FailurePolicy;
  readonly maxFetch: number;
  readonly retry: RetryConf;

  constructor(apiVersion: string, concurrency: number, failurePolicy: FailurePolicy, maxFetch: number, retry: RetryConf) {
    this.apiVersion = apiVersion;
    this.concurrency = concurrency;
    this.failurePolicy = failurePolicy;
    this.maxFetch = maxFetch;
    this.retry = Object.freeze({ ...retry });
    Object.freeze(this);
  }
}
