import type { Env } from "@shared/env";
import { z } from "zod";

import { ConfigError } from "../errors";
import { DEFAULT_TRADE_GATE_CONFIG as GATE } from "../gate/tradeGate";
import { DEFAULT_RISK_CONFIG as RISK } from "../risk/riskEngine";

const fraction = z.number().gt(0).max(1);

export const engineConfigSchema = z
  .object({
    gate: z
      .object({
        minSignals: z.number().int().min(1).default(GATE.minSignals),
        minSampleSize: z.number().int().min(0).default(GATE.minSampleSize),
        minWinRate: z.number().min(0).max(1).default(GATE.minWinRate),
        maxConsecutiveLosses: z.number().int().min(1).default(GATE.maxConsecutiveLosses),
        unseenPatternPolicy: z.enum(["explore", "deny"]).default(GATE.unseenPatternPolicy),
        minTradeScore: z.number().min(0).max(2).default(GATE.minTradeScore),
        adaptiveScoreAfter: z.number().int().min(0).default(GATE.adaptiveScoreAfter),
      })
      .default({}),
    risk: z
      .object({
        baseFraction: fraction.default(RISK.baseFraction),
        maxPositionSize: fraction.default(RISK.maxPositionSize),
        maxTotalRisk: fraction.default(RISK.maxTotalRisk),
        sizeIncrement: z.number().positive().default(RISK.sizeIncrement),
        winRateScaling: z.boolean().default(RISK.winRateScaling),
        maxDailyDrawdown: fraction.default(RISK.maxDailyDrawdown),
        minOrderIntervalMs: z.number().int().min(0).default(RISK.minOrderIntervalMs),
        riskScoreCeiling: z.number().min(0).max(100).default(RISK.riskScoreCeiling),
        exposureWeight: z.number().min(0).max(100).default(RISK.exposureWeight),
        drawdownWeight: z.number().min(0).max(100).default(RISK.drawdownWeight),
        tradingTimeZone: z.string().min(1).default(RISK.tradingTimeZone),
      })
      .default({}),
    memory: z
      .object({
        recentCapacity: z.number().int().min(1).default(5),
        /** 0 = unbounded */
        maxPatterns: z.number().int().min(0).default(10_000),
      })
      .default({}),
    orderTimeoutMs: z.number().int().positive().default(5_000),
    /** Smallest tradable quantity step in base units. */
    quantityIncrement: z.number().positive().default(0.000001),
    paperSlippage: z.number().min(0).lt(1).default(0.001),
    historyLimit: z.number().int().min(1).default(1_000),
  })
  .refine((c) => c.risk.exposureWeight + c.risk.drawdownWeight === 100, {
    message: "exposureWeight and drawdownWeight must sum to 100",
    path: ["risk"],
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/** Fill defaults and validate. Unset (undefined) fields keep their defaults. */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid engine configuration: ${issues}`, { cause: result.error });
  }
  return result.data;
}

/** Engine configuration from validated environment variables. */
export function loadEngineConfig(env: Env): EngineConfig {
  return resolveEngineConfig({
    gate: {
      minSignals: env.ENGINE_MIN_SIGNALS,
      minSampleSize: env.ENGINE_MIN_SAMPLE_SIZE,
      minWinRate: env.ENGINE_MIN_WIN_RATE,
      maxConsecutiveLosses: env.ENGINE_MAX_CONSECUTIVE_LOSSES,
      unseenPatternPolicy: env.ENGINE_UNSEEN_PATTERN_POLICY,
      minTradeScore: env.ENGINE_MIN_TRADE_SCORE,
    },
    risk: {
      maxPositionSize: env.ENGINE_MAX_POSITION_SIZE,
      maxTotalRisk: env.ENGINE_MAX_TOTAL_RISK,
      maxDailyDrawdown: env.ENGINE_MAX_DAILY_DRAWDOWN,
      minOrderIntervalMs: env.ENGINE_MIN_ORDER_INTERVAL_MS,
      riskScoreCeiling: env.ENGINE_RISK_SCORE_CEILING,
      tradingTimeZone: env.TRADING_TZ,
    },
    memory: { maxPatterns: env.ENGINE_MAX_PATTERNS },
    orderTimeoutMs: env.ENGINE_ORDER_TIMEOUT_MS,
    paperSlippage: env.ENGINE_PAPER_SLIPPAGE,
  });
}
