/**
 * Risk engine
 * Sizes and prices trades, and vetoes new positions from aggregate state
 * (rate limit, exposure, daily drawdown, risk score) independently of how
 * the pattern has performed.
 */

import type {
  Position,
  RiskMetrics,
  RiskVeto,
  Side,
  StopLevels,
  TradeRecord,
} from "@shared/types/trading";
import { tradingDayKey, tradingDayStart } from "@shared/utils/tradingDay";

import { ConfigError } from "../errors";
import type { EngineEventBus } from "../events/engineBus";
import { logger } from "../logger";
import { DEFAULT_SIZING_CONFIG, clamp, sizePosition, type SizingConfig } from "./sizing";
import { computeStops, sideSign } from "./stops";

const log = logger.child({ component: "riskEngine" });

/** Trades considered for win rate and profit factor. */
const PERFORMANCE_WINDOW = 100;

export interface RiskConfig extends SizingConfig {
  maxDailyDrawdown: number;
  minOrderIntervalMs: number;
  riskScoreCeiling: number;
  exposureWeight: number;
  drawdownWeight: number;
  tradingTimeZone: string;
}

export const DEFAULT_RISK_CONFIG: RiskConfig = {
  ...DEFAULT_SIZING_CONFIG,
  maxDailyDrawdown: 0.03,
  minOrderIntervalMs: 60_000,
  riskScoreCeiling: 80,
  exposureWeight: 40,
  drawdownWeight: 60,
  tradingTimeZone: "UTC",
};

export interface RiskCheck {
  allowed: boolean;
  veto: RiskVeto | null;
}

export interface MetricsInput {
  positions: readonly Position[];
  /** Latest price per symbol; positions without one use their last seen price. */
  prices?: ReadonlyMap<string, number>;
  trades: readonly TradeRecord[];
  capital?: number;
}

export interface RiskEngineOptions {
  config?: Partial<RiskConfig>;
  capital?: number;
  bus?: EngineEventBus;
  now?: () => number;
}

export class RiskEngine {
  private config: RiskConfig;
  private capital: number;
  private metrics: RiskMetrics;
  private lastOrderAt: number | null = null;
  private lastOrderSymbol: string | null = null;
  private readonly bus: EngineEventBus | undefined;
  private readonly now: () => number;

  constructor(options: RiskEngineOptions = {}) {
    this.config = { ...DEFAULT_RISK_CONFIG, ...options.config };
    if (this.config.exposureWeight + this.config.drawdownWeight !== 100) {
      throw new ConfigError(
        `Risk score weights must sum to 100 (got ${this.config.exposureWeight} + ${this.config.drawdownWeight})`,
      );
    }
    this.capital = options.capital ?? 0;
    this.bus = options.bus;
    this.now = options.now ?? Date.now;
    this.metrics = this.emptyMetrics(this.now());
  }

  getConfig(): RiskConfig {
    return { ...this.config };
  }

  getCapital(): number {
    return this.capital;
  }

  setCapital(capital: number): void {
    if (Number.isFinite(capital) && capital >= 0) {
      this.capital = capital;
    }
  }

  getMetrics(): RiskMetrics {
    return { ...this.metrics };
  }

  sizePosition(
    capital: number,
    signalStrength: number,
    volatility: number,
    currentExposure: number,
  ): number {
    const winRate = this.metrics.winRate > 0 ? this.metrics.winRate : null;
    return sizePosition(capital, signalStrength, volatility, currentExposure, this.config, winRate);
  }

  computeStops(entryPrice: number, side: Side, atr: number, volatility: number): StopLevels | null {
    return computeStops(entryPrice, side, atr, volatility);
  }

  canOpenPosition(symbol: string, size: number, capital: number): boolean {
    return this.checkOpenPosition(symbol, size, capital).allowed;
  }

  checkOpenPosition(symbol: string, size: number, capital: number): RiskCheck {
    const deny = (veto: RiskVeto): RiskCheck => {
      log.warn({ symbol, size, capital, veto, metrics: this.metrics }, "Risk limit vetoed position");
      return { allowed: false, veto };
    };

    if (!Number.isFinite(size) || !Number.isFinite(capital) || size <= 0 || capital <= 0) {
      return deny("invalid_input");
    }

    if (this.lastOrderAt !== null && this.now() - this.lastOrderAt < this.config.minOrderIntervalMs) {
      return deny("order_interval");
    }

    if (size / capital + this.metrics.currentExposure > this.config.maxTotalRisk) {
      return deny("exposure");
    }

    if (this.metrics.dailyDrawdown > this.config.maxDailyDrawdown) {
      return deny("daily_drawdown");
    }

    if (this.metrics.riskScore > this.config.riskScoreCeiling) {
      return deny("risk_score");
    }

    return { allowed: true, veto: null };
  }

  recordOrder(symbol: string, at: number = this.now()): void {
    this.lastOrderAt = at;
    this.lastOrderSymbol = symbol;
  }

  getLastOrder(): { symbol: string; at: number } | null {
    return this.lastOrderAt !== null && this.lastOrderSymbol !== null
      ? { symbol: this.lastOrderSymbol, at: this.lastOrderAt }
      : null;
  }

  shouldReduceExposure(): boolean {
    return (
      this.metrics.riskScore > 70 || this.metrics.dailyDrawdown > this.config.maxDailyDrawdown * 0.8
    );
  }

  /**
   * Recompute every metric from the given state. Nothing accumulates between
   * calls except the trading-day key used to announce a rollover.
   */
  updateMetrics(input: MetricsInput): RiskMetrics {
    if (input.capital !== undefined) this.setCapital(input.capital);

    const at = this.now();
    const tz = this.config.tradingTimeZone;
    const tradingDay = tradingDayKey(at, tz);
    const dayStart = tradingDayStart(tradingDay, tz);
    const capital = this.capital;

    let notional = 0;
    let unrealizedPnl = 0;
    for (const position of input.positions) {
      if (position.status !== "open") continue;
      const price = input.prices?.get(position.symbol) ?? position.lastPrice;
      notional += Math.abs(position.quantity * price);
      unrealizedPnl += (price - position.entryPrice) * position.quantity * sideSign(position.side);
    }

    const realizedPnlToday = input.trades
      .filter((t) => t.exitTime >= dayStart && t.exitTime <= at)
      .reduce((sum, t) => sum + t.realizedPnl, 0);

    const currentExposure = capital > 0 ? notional / capital : 0;
    const dailyPnl = realizedPnlToday + unrealizedPnl;
    const dailyDrawdown = capital > 0 && dailyPnl < 0 ? -dailyPnl / capital : 0;

    const exposureRatio = clamp(currentExposure / this.config.maxTotalRisk, 0, 1);
    const drawdownRatio =
      this.config.maxDailyDrawdown > 0 ? clamp(dailyDrawdown / this.config.maxDailyDrawdown, 0, 1) : 0;
    const riskScore =
      this.config.exposureWeight * exposureRatio + this.config.drawdownWeight * drawdownRatio;

    const recent = input.trades.slice(-PERFORMANCE_WINDOW);
    const wins = recent.filter((t) => t.realizedPnl > 0);
    const losses = recent.filter((t) => t.realizedPnl < 0);
    const grossProfit = wins.reduce((sum, t) => sum + t.realizedPnl, 0);
    const grossLoss = Math.abs(losses.reduce((sum, t) => sum + t.realizedPnl, 0));
    const avgWin = wins.length > 0 ? grossProfit / wins.length : 0;
    const avgLoss = losses.length > 0 ? grossLoss / losses.length : 0;

    const previousDay = this.metrics.tradingDay;

    this.metrics = {
      tradingDay,
      currentExposure,
      dailyDrawdown,
      riskScore,
      winRate: recent.length > 0 ? wins.length / recent.length : 0,
      profitFactor: grossLoss > 0 ? grossProfit / grossLoss : 0,
      avgWinLossRatio: avgLoss > 0 ? avgWin / avgLoss : 0,
      realizedPnlToday,
      unrealizedPnl,
      updatedAt: at,
    };

    if (previousDay !== tradingDay) {
      log.info({ previousDay, tradingDay }, "Trading day rolled");
      this.bus?.emit("risk:dayRolled", { previousDay, tradingDay });
    }

    this.bus?.emit("risk:updated", this.getMetrics());
    return this.getMetrics();
  }

  private emptyMetrics(at: number): RiskMetrics {
    return {
      tradingDay: tradingDayKey(at, this.config.tradingTimeZone),
      currentExposure: 0,
      dailyDrawdown: 0,
      riskScore: 0,
      winRate: 0,
      profitFactor: 0,
      avgWinLossRatio: 0,
      realizedPnlToday: 0,
      unrealizedPnl: 0,
      updatedAt: at,
    };
  }
}
