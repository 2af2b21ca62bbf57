import { Observable, timer } from 'rxjs';
import { retry } from 'rxjs/operators';
import { Counter } from 'prom-client';

import { logger } from '../../utils/logger.js';

export interface RetryConfig {
  maxRetries: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

const defaultConfig: RetryConfig = {
  maxRetries: 3,
  initialDelay: 2000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

const retriesCounter = new Counter({
  name: 'stream_retries_total',
  help: 'Retries scheduled after a stream error',
  labelNames: ['stream'] as const,
});

/**
 * Resubscribe to the source after an error, waiting
 * initialDelay * backoffMultiplier^(attempt - 1) capped at maxDelay. The
 * error is rethrown once maxRetries resubscriptions have failed.
 */
export function withRetry<T>(
  streamName: string,
  config: Partial<RetryConfig> = {}
) {
  const { maxRetries, initialDelay, maxDelay, backoffMultiplier } = {
    ...defaultConfig,
    ...config,
  };

  return (source$: Observable<T>): Observable<T> =>
    source$.pipe(
      retry({
        count: maxRetries,
        delay: (error: unknown, retryCount: number) => {
          const delay = Math.min(
            initialDelay * Math.pow(backoffMultiplier, retryCount - 1),
            maxDelay
          );

          retriesCounter.inc({ stream: streamName });
          logger.warn(
            {
              stream: streamName,
              error: error instanceof Error ? error.message : String(error),
              attempt: retryCount,
              maxRetries,
              nextRetryIn: delay,
            },
            'Retrying stream after error'
          );

          return timer(delay);
        },
      })
    );
}
