import { Observable, EMPTY, defer, interval } from 'rxjs';
import { catchError, exhaustMap, map, startWith, tap } from 'rxjs/operators';
import { Counter } from 'prom-client';

import { fetchUserFills } from '../../hyperliquid/client.js';
import type { HyperliquidFill } from '../../hyperliquid/types.js';
import { logger } from '../../utils/logger.js';
import { withRetry, type RetryConfig } from '../operators/with-retry.js';

export interface FillsBatch {
  address: string;
  fills: HyperliquidFill[];
  polledAt: Date;
}

export interface FillsStreamOptions {
  address: string;
  pollIntervalMs: number;
  /** Width of the window requested on each poll, ending now. */
  lookbackMs: number;
  retry?: Partial<RetryConfig>;
}

export type FetchFills = (
  address: string,
  startTime: number,
  endTime: number
) => Observable<HyperliquidFill[]>;

const pollsCounter = new Counter({
  name: 'fill_polls_total',
  help: 'Fill polls by outcome',
  labelNames: ['result'] as const,
});

const fillsReceivedCounter = new Counter({
  name: 'fills_received_total',
  help: 'Fills returned by the venue, duplicates included',
});

/**
 * Poll the venue for the monitored account's fills: once immediately, then
 * every pollIntervalMs. A tick that arrives while the previous poll is still
 * in flight is skipped. Each batch is sorted by fill time.
 *
 * A poll that still fails after its retries is logged and dropped; the
 * stream keeps polling.
 */
export function createFillsStream(
  options: FillsStreamOptions,
  fetchFills: FetchFills = fetchUserFills
): Observable<FillsBatch> {
  const { address, pollIntervalMs, lookbackMs } = options;

  return interval(pollIntervalMs).pipe(
    startWith(0),
    exhaustMap(() =>
      defer(() => {
        const endTime = Date.now();
        return fetchFills(address, endTime - lookbackMs, endTime).pipe(
          map(fills => ({
            address,
            fills: [...fills].sort((a, b) => a.time - b.time),
            polledAt: new Date(endTime),
          }))
        );
      }).pipe(
        withRetry<FillsBatch>('fills-poll', options.retry),
        tap(batch => {
          pollsCounter.inc({ result: 'success' });
          fillsReceivedCounter.inc(batch.fills.length);
        }),
        catchError((error: unknown) => {
          pollsCounter.inc({ result: 'error' });
          logger.error(
            { address, error: error instanceof Error ? error.message : String(error) },
            'Failed to poll fills after retries'
          );
          return EMPTY;
        })
      )
    )
  );
}
