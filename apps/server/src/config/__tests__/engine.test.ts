import { envSchema } from "@shared/env";
import { describe, it, expect } from "vitest";

import { ConfigError } from "../../errors";
import { loadEngineConfig, resolveEngineConfig } from "../engine";

describe("engine config", () => {
  it("fills every default", () => {
    const config = resolveEngineConfig();

    expect(config.gate).toEqual({
      minSignals: 2,
      minSampleSize: 5,
      minWinRate: 0.4,
      maxConsecutiveLosses: 3,
      unseenPatternPolicy: "explore",
      minTradeScore: 0,
      adaptiveScoreAfter: 0,
    });
    expect(config.risk).toMatchObject({
      maxPositionSize: 0.02,
      maxTotalRisk: 0.05,
      maxDailyDrawdown: 0.03,
      minOrderIntervalMs: 60_000,
      riskScoreCeiling: 80,
      sizeIncrement: 0.00001,
      tradingTimeZone: "UTC",
    });
    expect(config.orderTimeoutMs).toBe(5_000);
    expect(config.paperSlippage).toBe(0.001);
  });

  it("maps environment overrides", () => {
    const env = envSchema.parse({
      ENGINE_MIN_SIGNALS: "3",
      ENGINE_UNSEEN_PATTERN_POLICY: "deny",
      ENGINE_MAX_TOTAL_RISK: "0.1",
      ENGINE_MIN_TRADE_SCORE: "1.2",
      TRADING_TZ: "America/New_York",
    });
    const config = loadEngineConfig(env);

    expect(config.gate.minSignals).toBe(3);
    expect(config.gate.unseenPatternPolicy).toBe("deny");
    expect(config.gate.minSampleSize).toBe(5);
    expect(config.gate.minTradeScore).toBe(1.2);
    expect(config.risk.maxTotalRisk).toBe(0.1);
    expect(config.risk.tradingTimeZone).toBe("America/New_York");
  });

  it("rejects out-of-range values", () => {
    const env = envSchema.parse({ ENGINE_MAX_TOTAL_RISK: "2" });
    expect(() => loadEngineConfig(env)).toThrow(ConfigError);
  });

  it("rejects score weights that do not sum to 100", () => {
    expect(() => resolveEngineConfig({ risk: { exposureWeight: 50 } })).toThrow(/sum to 100/);
  });
});
