import type { MarketContext } from "@shared/types/trading";
import { describe, it, expect, beforeEach } from "vitest";

import { createTradingEngine, type TradingEngine } from "../../engine/tradingEngine";
import { MemoryEngineStore } from "../engineStore";
import { PersistenceSync, hydrateEngine } from "../persistenceSync";

const T0 = Date.UTC(2024, 0, 15, 12, 0, 0);
const SIGNALS = ["RSI_OVERSOLD", "MACD_CROSS"];
const CONTEXT: MarketContext = { side: "long", price: 100, atr: 1, volatility: 0.01, signalStrength: 0.8 };

describe("PersistenceSync", () => {
  let clock: number;
  let store: MemoryEngineStore;
  let engine: TradingEngine;
  let sync: PersistenceSync;

  beforeEach(() => {
    clock = T0;
    store = new MemoryEngineStore();
    engine = createTradingEngine({ capital: 10_000, config: { paperSlippage: 0 }, now: () => clock });
    sync = new PersistenceSync(store, engine.bus);
    sync.start();
  });

  it("round-trips patterns, open positions and trades", async () => {
    await engine.submitTrade({ symbol: "BTCUSDT", signals: SIGNALS, capital: 10_000, context: CONTEXT });
    clock = T0 + 120_000;
    await engine.submitTrade({ symbol: "ETHUSDT", signals: SIGNALS, capital: 10_000, context: CONTEXT });
    engine.onPriceTick({ symbol: "BTCUSDT", price: 101 });
    engine.close("ETHUSDT", 99);
    await sync.flush();

    const open = await store.loadOpenPositions();
    expect(open.map((p) => [p.symbol, p.lastPrice])).toEqual([["BTCUSDT", 101]]);

    const fresh = createTradingEngine({ capital: 10_000, now: () => clock });
    const loaded = await hydrateEngine(fresh, store);

    expect(loaded).toEqual({ patterns: 1, positions: 1, trades: 1 });
    expect(fresh.positions()).toEqual(engine.positions());
    expect(fresh.patternReport()).toEqual(engine.patternReport());
    expect(fresh.tradeHistory()).toEqual(engine.tradeHistory());
  });

  it("stops writing once stopped", async () => {
    sync.stop();
    await engine.submitTrade({ symbol: "BTCUSDT", signals: SIGNALS, capital: 10_000, context: CONTEXT });
    await sync.flush();

    expect(await store.loadOpenPositions()).toEqual([]);
  });

  it("counts failed writes and keeps going", async () => {
    store.savePattern = async () => {
      throw new Error("disk full");
    };

    await engine.submitTrade({ symbol: "BTCUSDT", signals: SIGNALS, capital: 10_000, context: CONTEXT });
    engine.close("BTCUSDT", 99);
    await sync.flush();

    expect(sync.getStats().failures).toBe(1);
    expect(await store.loadTrades(10)).toHaveLength(1);
  });
});

describe("MemoryEngineStore", () => {
  it("returns the most recent trades oldest first", async () => {
    const store = new MemoryEngineStore();
    const engine = createTradingEngine({ capital: 10_000, config: { risk: { minOrderIntervalMs: 0 } } });
    const sync = new PersistenceSync(store, engine.bus);
    sync.start();

    for (const exit of [101, 102, 103]) {
      await engine.submitTrade({ symbol: "BTCUSDT", signals: SIGNALS, capital: 10_000, context: CONTEXT });
      engine.close("BTCUSDT", exit);
    }
    await sync.flush();

    const trades = await store.loadTrades(2);
    expect(trades.map((t) => t.exitPrice)).toEqual([102, 103]);
  });
});
