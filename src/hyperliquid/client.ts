import { Observable, defer, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';

import { parseClosedPnl } from '../pnl/calculator.js';
import type { Fill } from '../pnl/types.js';
import { config } from '../utils/config.js';
import { tryParseDecimal } from '../utils/decimal.js';
import { logger } from '../utils/logger.js';

import {
  hyperliquidFillsResponseSchema,
  type HyperliquidFill,
  type HyperliquidInfoRequest,
} from './types.js';

export function getInfoApiUrl(): string {
  return config.HYPERLIQUID_USE_TESTNET
    ? config.HYPERLIQUID_TESTNET_API_URL
    : config.HYPERLIQUID_API_URL;
}

async function postInfo(request: HyperliquidInfoRequest): Promise<unknown> {
  const response = await fetch(`${getInfoApiUrl()}/info`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(request),
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`Hyperliquid API error: ${response.status} - ${errorText}`);
  }

  return response.json();
}

/**
 * Fills of `userAddress` between `startTime` and `endTime` (epoch ms).
 * Each subscription issues a fresh request, so retry operators downstream
 * re-fetch instead of replaying a settled promise.
 */
export function fetchUserFills(
  userAddress: string,
  startTime: number,
  endTime?: number
): Observable<HyperliquidFill[]> {
  const request: HyperliquidInfoRequest = {
    type: 'userFillsByTime',
    user: userAddress,
    startTime,
    ...(endTime !== undefined && { endTime }),
  };

  return defer(async () => hyperliquidFillsResponseSchema.parse(await postInfo(request))).pipe(
    tap(fills => logger.debug({ user: userAddress, count: fills.length }, 'Fetched user fills')),
    catchError((error: unknown) => {
      logger.error(
        { error: error instanceof Error ? error.message : String(error), user: userAddress },
        'Failed to fetch user fills'
      );
      return throwError(() => error);
    })
  );
}

/**
 * Convert a venue fill into the session's Fill. Returns null when size or
 * price is not a usable number; a malformed closedPnl only becomes zero.
 */
export function parseHyperliquidFill(raw: HyperliquidFill): Fill | null {
  const size = tryParseDecimal(raw.sz);
  const price = tryParseDecimal(raw.px);
  if (!size || !price || size.lessThan(0) || !price.greaterThan(0)) {
    return null;
  }

  return {
    coin: raw.coin,
    side: raw.side === 'B' ? 'buy' : 'sell',
    size,
    price,
    closedPnl: parseClosedPnl(raw.closedPnl),
    time: raw.time,
    hash: raw.hash,
  };
}

export function isValidAddress(address: string): boolean {
  return /^0x[a-fA-F0-9]{40}$/.test(address);
}
