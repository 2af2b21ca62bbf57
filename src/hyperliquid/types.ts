import { z } from 'zod';

/**
 * One entry of the `userFills` / `userFillsByTime` info responses. Numeric
 * fields arrive as decimal strings. Fields this service does not read are
 * passed through untouched.
 */
export const hyperliquidFillSchema = z
  .object({
    coin: z.string(),
    px: z.string(),
    sz: z.string(),
    side: z.enum(['A', 'B']),
    time: z.number(),
    startPosition: z.string().optional(),
    dir: z.string().optional(),
    closedPnl: z.string().optional(),
    hash: z.string(),
    oid: z.number().optional(),
    crossed: z.boolean().optional(),
    fee: z.string().optional(),
    tid: z.number().optional(),
  })
  .passthrough();

export const hyperliquidFillsResponseSchema = z.array(hyperliquidFillSchema);

export type HyperliquidFill = z.infer<typeof hyperliquidFillSchema>;

export interface HyperliquidInfoRequest {
  type: 'userFills' | 'userFillsByTime';
  user: string;
  startTime?: number;
  endTime?: number;
}
