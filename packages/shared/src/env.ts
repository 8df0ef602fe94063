import { z } from "zod";

const optionalNumber = z.coerce.number().optional();

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  DATABASE_URL: z.string().url().optional(),
  APP_ORIGIN: z.string().url().optional(),

  // Trading day boundary
  TRADING_TZ: z.string().min(1).default("UTC"),

  // Engine overrides (unset = engine defaults)
  ENGINE_MIN_SIGNALS: optionalNumber,
  ENGINE_MIN_SAMPLE_SIZE: optionalNumber,
  ENGINE_MIN_WIN_RATE: optionalNumber,
  ENGINE_MAX_CONSECUTIVE_LOSSES: optionalNumber,
  ENGINE_UNSEEN_PATTERN_POLICY: z.enum(["explore", "deny"]).optional(),
  ENGINE_MIN_TRADE_SCORE: optionalNumber,
  ENGINE_MAX_PATTERNS: optionalNumber,
  ENGINE_MAX_POSITION_SIZE: optionalNumber,
  ENGINE_MAX_TOTAL_RISK: optionalNumber,
  ENGINE_MAX_DAILY_DRAWDOWN: optionalNumber,
  ENGINE_MIN_ORDER_INTERVAL_MS: optionalNumber,
  ENGINE_RISK_SCORE_CEILING: optionalNumber,
  ENGINE_ORDER_TIMEOUT_MS: optionalNumber,
  ENGINE_PAPER_SLIPPAGE: optionalNumber,
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    console.error("❌ Environment validation failed:");
    console.error(result.error.format());
    throw new Error("Invalid environment variables");
  }

  return result.data;
}
