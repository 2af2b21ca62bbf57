import { describe, it, expect, beforeEach } from 'vitest';
import { TestScheduler } from 'rxjs/testing';
import { Observable, lastValueFrom } from 'rxjs';
import { register } from 'prom-client';

import { withRetry } from './with-retry.js';

function failingTimes(failures: number, value: string): { source$: Observable<string>; calls: () => number } {
  let callCount = 0;
  const source$ = new Observable<string>(subscriber => {
    callCount++;
    if (callCount <= failures) {
      subscriber.error(new Error(`failure ${callCount}`));
    } else {
      subscriber.next(value);
      subscriber.complete();
    }
  });
  return { source$, calls: () => callCount };
}

describe('withRetry Operator', () => {
  let testScheduler: TestScheduler;

  beforeEach(() => {
    testScheduler = new TestScheduler((actual, expected) => {
      expect(actual).toEqual(expected);
    });
  });

  it('should pass through successful emissions', () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const source$ = cold('a-b-c|');

      expectObservable(source$.pipe(withRetry('test-stream', { maxRetries: 3 }))).toBe('a-b-c|');
    });
  });

  it('should back off exponentially between attempts', () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const source$ = cold('#');

      // Attempts at 0, 10, 30 (10 + 20), then the error at 70 (30 + 40)
      const result$ = source$.pipe(
        withRetry('test-stream', { maxRetries: 3, initialDelay: 10, backoffMultiplier: 2, maxDelay: 1000 })
      );

      expectObservable(result$).toBe('70ms #');
    });
  });

  it('should cap the delay at maxDelay', () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const source$ = cold('#');

      const result$ = source$.pipe(
        withRetry('test-stream', { maxRetries: 3, initialDelay: 10, backoffMultiplier: 10, maxDelay: 50 })
      );

      expectObservable(result$).toBe('110ms #');
    });
  });

  it('should rethrow after max retries', async () => {
    const { source$, calls } = failingTimes(10, 'never');

    await expect(
      lastValueFrom(source$.pipe(withRetry('test-stream', { maxRetries: 2, initialDelay: 5 })))
    ).rejects.toThrow('failure 3');

    expect(calls()).toBe(3);
  });

  it('should succeed after transient failures', async () => {
    const { source$, calls } = failingTimes(2, 'success');

    const result = await lastValueFrom(source$.pipe(withRetry('test-stream', { maxRetries: 3, initialDelay: 5 })));

    expect(result).toBe('success');
    expect(calls()).toBe(3);
  });

  it('should count retries per stream', async () => {
    const { source$ } = failingTimes(2, 'ok');

    await lastValueFrom(source$.pipe(withRetry('counted-stream', { maxRetries: 3, initialDelay: 5 })));

    const metrics = await register.getSingleMetricAsString('stream_retries_total');
    expect(metrics).toContain('stream_retries_total{stream="counted-stream"} 2');
  });
});
