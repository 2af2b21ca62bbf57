import { describe, it, expect } from 'vitest';

import { parseConfig } from './config.js';

const TARGET = '0x1234567890abcdef1234567890abcdef12345678';

describe('parseConfig', () => {
  it('should apply defaults', () => {
    const result = parseConfig({ TARGET_ACCOUNT: TARGET });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.COPY_THRESHOLD).toBe(1000);
    expect(result.data.BANKROLL).toBe(10000);
    expect(result.data.LEVERAGE).toBe(1);
    expect(result.data.BASE_NOTIONAL).toBeUndefined();
    expect(result.data.DISABLE_DYNAMIC_SIZING).toBe(false);
    expect(result.data.MIN_TRADE_INTERVAL_MS).toBe(60000);
    expect(result.data.VOLUME_THRESHOLD).toBe(1000);
    expect(result.data.VOLUME_DECAY_RATE).toBe(0.5);
    expect(result.data.POLL_INTERVAL_MS).toBe(5000);
    expect(result.data.MAX_FILLS_PER_CHECK).toBe(50);
    expect(result.data.JOURNAL_ENABLED).toBe(true);
    expect(result.data.HYPERLIQUID_USE_TESTNET).toBe(false);
  });

  it('should coerce numeric strings', () => {
    const result = parseConfig({
      TARGET_ACCOUNT: TARGET,
      BANKROLL: '2500.5',
      LEVERAGE: '3',
      BASE_NOTIONAL: '250',
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.BANKROLL).toBe(2500.5);
    expect(result.data.LEVERAGE).toBe(3);
    expect(result.data.BASE_NOTIONAL).toBe(250);
  });

  it('should treat an empty base notional as unset', () => {
    const result = parseConfig({ TARGET_ACCOUNT: TARGET, BASE_NOTIONAL: '' });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.BASE_NOTIONAL).toBeUndefined();
  });

  it('should read "false" as false', () => {
    const result = parseConfig({
      TARGET_ACCOUNT: TARGET,
      JOURNAL_ENABLED: 'false',
      API_ENABLED: '0',
      HYPERLIQUID_USE_TESTNET: 'true',
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.JOURNAL_ENABLED).toBe(false);
    expect(result.data.API_ENABLED).toBe(false);
    expect(result.data.HYPERLIQUID_USE_TESTNET).toBe(true);
  });

  it('should reject unrecognised booleans', () => {
    expect(parseConfig({ TARGET_ACCOUNT: TARGET, JOURNAL_ENABLED: 'yes' }).success).toBe(false);
  });

  it('should reject leverage below 1', () => {
    expect(parseConfig({ TARGET_ACCOUNT: TARGET, LEVERAGE: '0.5' }).success).toBe(false);
  });

  it('should reject a non-positive bankroll', () => {
    expect(parseConfig({ TARGET_ACCOUNT: TARGET, BANKROLL: '0' }).success).toBe(false);
  });

  it('should reject a decay rate above 1', () => {
    expect(parseConfig({ TARGET_ACCOUNT: TARGET, VOLUME_DECAY_RATE: '1.5' }).success).toBe(false);
  });
});
