import { describe, it, expect } from 'vitest';

import { envSchema } from './env';
import { evaluateTradeSchema, priceTickSchema } from './schemas';

const context = { side: 'long', price: 100, atr: 1, volatility: 0.01, signalStrength: 0.8 };

describe('evaluateTradeSchema', () => {
  it('normalises the symbol', () => {
    const parsed = evaluateTradeSchema.parse({ symbol: ' btcusdt ', signals: ['A', 'B'], capital: 10_000, context });
    expect(parsed.symbol).toBe('BTCUSDT');
  });

  it('rejects out-of-range signal strength', () => {
    const result = evaluateTradeSchema.safeParse({
      symbol: 'BTCUSDT',
      signals: ['A', 'B'],
      capital: 10_000,
      context: { ...context, signalStrength: 1.5 },
    });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown side', () => {
    const result = evaluateTradeSchema.safeParse({
      symbol: 'BTCUSDT',
      signals: ['A'],
      capital: 10_000,
      context: { ...context, side: 'sideways' },
    });
    expect(result.success).toBe(false);
  });
});

describe('priceTickSchema', () => {
  it('accepts a tick with a consistent range', () => {
    expect(priceTickSchema.parse({ symbol: 'ethusdt', price: 100, high: 101, low: 99 })).toEqual({
      symbol: 'ETHUSDT',
      price: 100,
      high: 101,
      low: 99,
    });
  });

  it('rejects a range that excludes the price', () => {
    expect(priceTickSchema.safeParse({ symbol: 'ETHUSDT', price: 100, low: 100.5 }).success).toBe(false);
  });
});

describe('envSchema', () => {
  it('applies defaults', () => {
    const env = envSchema.parse({});
    expect(env).toMatchObject({ NODE_ENV: 'development', LOG_LEVEL: 'info', PORT: 8080, TRADING_TZ: 'UTC' });
    expect(env.ENGINE_MIN_SIGNALS).toBeUndefined();
  });

  it('coerces numeric engine overrides', () => {
    const env = envSchema.parse({ ENGINE_MIN_SIGNALS: '3', ENGINE_MAX_TOTAL_RISK: '0.1' });
    expect(env.ENGINE_MIN_SIGNALS).toBe(3);
    expect(env.ENGINE_MAX_TOTAL_RISK).toBe(0.1);
  });
});
