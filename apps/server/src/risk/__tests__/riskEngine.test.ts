import type { Position, TradeRecord } from "@shared/types/trading";
import { describe, it, expect, beforeEach, vi } from "vitest";

import { ConfigError } from "../../errors";
import { createEngineBus } from "../../events/engineBus";
import { canonicalPattern } from "../../patterns/patternMemory";
import { RiskEngine } from "../riskEngine";

const NOON = Date.UTC(2024, 0, 15, 12, 0, 0);
const pattern = canonicalPattern(["A", "B"]);

function position(overrides: Partial<Position> = {}): Position {
  return {
    id: "pos-1",
    symbol: "BTCUSDT",
    side: "long",
    entryPrice: 100,
    quantity: 4,
    entryTime: NOON - 60_000,
    stopLoss: 97.8,
    initialStopLoss: 97.8,
    emergencyStop: 96.7,
    takeProfit: 104.4,
    lastPrice: 100,
    bestPrice: 100,
    unrealizedPnl: 0,
    pattern,
    status: "open",
    ...overrides,
  };
}

function trade(realizedPnl: number, exitTime: number = NOON - 1_000): TradeRecord {
  return {
    positionId: `t-${realizedPnl}-${exitTime}`,
    symbol: "BTCUSDT",
    side: "long",
    entryPrice: 100,
    exitPrice: 100,
    quantity: 1,
    entryTime: exitTime - 1_000,
    exitTime,
    durationMs: 1_000,
    exitReason: "manual",
    realizedPnl,
    returnPct: 0,
    pattern,
  };
}

describe("RiskEngine", () => {
  let clock: number;
  let risk: RiskEngine;

  beforeEach(() => {
    clock = NOON;
    risk = new RiskEngine({ capital: 10_000, now: () => clock });
  });

  it("requires score weights that sum to 100", () => {
    expect(() => new RiskEngine({ config: { exposureWeight: 50, drawdownWeight: 60 } })).toThrow(ConfigError);
  });

  it("allows a trade within every limit", () => {
    expect(risk.checkOpenPosition("BTCUSDT", 127.4, 10_000)).toEqual({ allowed: true, veto: null });
    expect(risk.canOpenPosition("BTCUSDT", 127.4, 10_000)).toBe(true);
  });

  it("reports a positive zero drawdown on a flat or winning day", () => {
    expect(Object.is(risk.updateMetrics({ positions: [], trades: [] }).dailyDrawdown, 0)).toBe(true);
    expect(Object.is(risk.updateMetrics({ positions: [], trades: [trade(25)] }).dailyDrawdown, 0)).toBe(true);
  });

  it("vetoes invalid size or capital", () => {
    expect(risk.checkOpenPosition("BTCUSDT", 0, 10_000).veto).toBe("invalid_input");
    expect(risk.checkOpenPosition("BTCUSDT", 100, 0).veto).toBe("invalid_input");
  });

  it("enforces the minimum interval between orders", () => {
    risk.recordOrder("BTCUSDT", NOON - 30_000);
    expect(risk.checkOpenPosition("ETHUSDT", 100, 10_000).veto).toBe("order_interval");

    clock = NOON + 30_000;
    expect(risk.checkOpenPosition("ETHUSDT", 100, 10_000).allowed).toBe(true);
    expect(risk.getLastOrder()).toEqual({ symbol: "BTCUSDT", at: NOON - 30_000 });
  });

  it("vetoes a trade that would exceed total exposure", () => {
    const metrics = risk.updateMetrics({ positions: [position()], trades: [] });
    expect(metrics.currentExposure).toBeCloseTo(0.04, 10);

    expect(risk.checkOpenPosition("BTCUSDT", 127.4, 10_000).veto).toBe("exposure");
  });

  it("vetoes new positions past the daily drawdown limit", () => {
    const metrics = risk.updateMetrics({ positions: [], trades: [trade(-350)] });
    expect(metrics.dailyDrawdown).toBeCloseTo(0.035, 10);
    expect(metrics.riskScore).toBeCloseTo(60, 10);

    expect(risk.checkOpenPosition("BTCUSDT", 50, 10_000).veto).toBe("daily_drawdown");
  });

  it("vetoes when the combined risk score is above the ceiling", () => {
    const metrics = risk.updateMetrics({ positions: [position()], trades: [trade(-250)] });
    expect(metrics.riskScore).toBeCloseTo(82, 8);

    expect(risk.checkOpenPosition("BTCUSDT", 50, 10_000).veto).toBe("risk_score");
    expect(risk.shouldReduceExposure()).toBe(true);
  });

  it("counts unrealized losses and only today's realized results", () => {
    const yesterday = NOON - 24 * 60 * 60 * 1000;
    const metrics = risk.updateMetrics({
      positions: [position()],
      prices: new Map([["BTCUSDT", 95]]),
      trades: [trade(-500, yesterday), trade(40)],
    });

    expect(metrics.unrealizedPnl).toBeCloseTo(-20, 10);
    expect(metrics.realizedPnlToday).toBe(40);
    expect(metrics.dailyDrawdown).toBe(0);
    expect(metrics.currentExposure).toBeCloseTo(0.038, 10);
  });

  it("measures shorts against the latest price", () => {
    const metrics = risk.updateMetrics({
      positions: [position({ side: "short" })],
      prices: new Map([["BTCUSDT", 110]]),
      trades: [],
    });

    expect(metrics.unrealizedPnl).toBeCloseTo(-40, 10);
    expect(metrics.dailyDrawdown).toBeCloseTo(0.004, 10);
  });

  it("derives performance ratios from recent trades", () => {
    const metrics = risk.updateMetrics({ positions: [], trades: [trade(30), trade(-10), trade(20), trade(-20)] });

    expect(metrics.winRate).toBe(0.5);
    expect(metrics.profitFactor).toBeCloseTo(50 / 30, 10);
    expect(metrics.avgWinLossRatio).toBeCloseTo(25 / 15, 10);
  });

  it("reports zero exposure and drawdown without capital", () => {
    const broke = new RiskEngine({ now: () => clock });
    const metrics = broke.updateMetrics({ positions: [position()], trades: [trade(-100)] });

    expect(metrics.currentExposure).toBe(0);
    expect(metrics.dailyDrawdown).toBe(0);
    expect(metrics.riskScore).toBe(0);
  });

  it("announces a new trading day", () => {
    const bus = createEngineBus();
    const rolled = vi.fn();
    bus.on("risk:dayRolled", rolled);
    const engine = new RiskEngine({ capital: 10_000, bus, now: () => clock });

    engine.updateMetrics({ positions: [], trades: [trade(-200)] });
    expect(rolled).not.toHaveBeenCalled();

    clock = Date.UTC(2024, 0, 16, 0, 0, 1);
    const metrics = engine.updateMetrics({ positions: [], trades: [trade(-200)] });

    expect(rolled).toHaveBeenCalledWith({ previousDay: "2024-01-15", tradingDay: "2024-01-16" });
    expect(metrics.realizedPnlToday).toBe(0);
    expect(metrics.dailyDrawdown).toBe(0);
  });

  it("uses the configured time zone for the day boundary", () => {
    const ny = new RiskEngine({
      capital: 10_000,
      config: { tradingTimeZone: "America/New_York" },
      now: () => Date.UTC(2024, 0, 16, 3, 0, 0),
    });

    const metrics = ny.updateMetrics({ positions: [], trades: [trade(-100, Date.UTC(2024, 0, 15, 20, 0, 0))] });
    expect(metrics.tradingDay).toBe("2024-01-15");
    expect(metrics.realizedPnlToday).toBe(-100);
  });
});
