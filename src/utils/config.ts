import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

// z.coerce.boolean() treats any non-empty string (including "false") as true
const envBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const optionalPositiveNumber = z.preprocess(
  value => (value === '' ? undefined : value),
  z.coerce.number().positive().optional()
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  API_ENABLED: envBoolean.default('true'),

  HYPERLIQUID_API_URL: z.string().url().default('https://api.hyperliquid.xyz'),
  HYPERLIQUID_TESTNET_API_URL: z.string().url().default('https://api.hyperliquid-testnet.xyz'),
  HYPERLIQUID_USE_TESTNET: envBoolean.default('false'),

  TARGET_ACCOUNT: isTest
    ? z.string().default('0x0000000000000000000000000000000000000000')
    : z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'must be a 0x-prefixed 40 hex character address'),
  COPY_THRESHOLD: z.coerce.number().nonnegative().default(1000),

  // Paper account
  BANKROLL: z.coerce.number().positive().default(10000),
  LEVERAGE: z.coerce.number().min(1).default(1),
  BASE_NOTIONAL: optionalPositiveNumber,
  DISABLE_DYNAMIC_SIZING: envBoolean.default('false'),

  // Fill aggregation
  MIN_TRADE_INTERVAL_MS: z.coerce.number().nonnegative().default(60000),
  VOLUME_THRESHOLD: z.coerce.number().nonnegative().default(1000),
  VOLUME_DECAY_RATE: z.coerce.number().min(0).max(1).default(0.5),

  // Fill polling
  POLL_INTERVAL_MS: z.coerce.number().positive().default(5000),
  FILLS_LOOKBACK_MS: z.coerce.number().positive().default(60 * 60 * 1000),
  PROCESSED_FILL_TTL_MS: z.coerce.number().positive().default(2 * 60 * 60 * 1000),
  MAX_FILLS_PER_CHECK: z.coerce.number().int().positive().default(50),
  MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  RETRY_DELAY_MS: z.coerce.number().nonnegative().default(2000),

  // Reporting
  SUMMARY_EVERY_TRADES: z.coerce.number().int().positive().default(10),
  RECENT_TRADES_COUNT: z.coerce.number().int().positive().default(10),

  // Journal
  DATA_DIR: z.string().default('./data'),
  JOURNAL_ENABLED: envBoolean.default('true'),
});

export type Config = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv) {
  return envSchema.safeParse(env);
}

const parseResult = parseConfig(process.env);

if (!parseResult.success && !isTest) {
  console.error('❌ Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

export const config: Config = parseResult.success ? parseResult.data : envSchema.parse({});
