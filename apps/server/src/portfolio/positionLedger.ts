/**
 * Position ledger
 * Owns open positions, marks them on every price tick, fires protective exits
 * and turns closed positions into read-only trade records. Every close feeds
 * the realized result back into pattern memory and the risk engine.
 *
 * All mutations are synchronous: a close runs to completion on the event loop,
 * so two ticks can never settle the same position twice.
 */

import { nanoid } from "nanoid";
import type {
  ExitReason,
  Pattern,
  PortfolioSummary,
  Position,
  PriceTick,
  RiskMetrics,
  Side,
  TradeRecord,
  TradeStatistics,
} from "@shared/types/trading";

import type { EngineEventBus } from "../events/engineBus";
import { logger } from "../logger";
import type { PatternMemory } from "../patterns/patternMemory";
import type { RiskEngine } from "../risk/riskEngine";
import { sideSign } from "../risk/stops";

const log = logger.child({ component: "positionLedger" });

export interface OpenPositionInput {
  symbol: string;
  side: Side;
  quantity: number;
  entryPrice: number;
  stops: {
    stopLoss: number;
    emergencyStop: number;
    takeProfit: number;
    trailingStep?: number;
  };
  pattern: Pattern;
  entryTime?: number;
}

export type OpenError = "invalid_quantity" | "invalid_price" | "invalid_stops";

export type OpenResult = { ok: true; position: Position } | { ok: false; error: OpenError };

export interface PositionLedgerOptions {
  memory: PatternMemory;
  risk: RiskEngine;
  bus?: EngineEventBus;
  /** Closed trades kept in memory; totals keep counting past the limit. */
  historyLimit?: number;
  now?: () => number;
  createId?: () => string;
}

interface ExitSignal {
  reason: ExitReason;
  price: number;
}

function copyPosition(position: Position): Position {
  return { ...position };
}

function validStops(side: Side, entry: number, stops: OpenPositionInput["stops"]): boolean {
  const values = [stops.stopLoss, stops.emergencyStop, stops.takeProfit];
  if (!values.every(Number.isFinite)) return false;
  if (stops.trailingStep !== undefined && !(stops.trailingStep > 0)) return false;

  return side === "long"
    ? stops.emergencyStop <= stops.stopLoss && stops.stopLoss < entry && stops.takeProfit > entry
    : stops.emergencyStop >= stops.stopLoss && stops.stopLoss > entry && stops.takeProfit < entry;
}

/** Deepest fall of the cumulative PnL curve below its running peak; the curve starts at 0. */
function maxDrawdown(pnls: readonly number[]): number {
  let cumulative = 0;
  let peak = 0;
  let deepest = 0;
  for (const pnl of pnls) {
    cumulative += pnl;
    peak = Math.max(peak, cumulative);
    deepest = Math.max(deepest, peak - cumulative);
  }
  return deepest;
}

export class PositionLedger {
  private byId = new Map<string, Position>();
  private history: TradeRecord[] = [];
  private lastPrices = new Map<string, number>();
  private realizedTotal = 0;
  private readonly memory: PatternMemory;
  private readonly risk: RiskEngine;
  private readonly bus: EngineEventBus | undefined;
  private readonly historyLimit: number;
  private readonly now: () => number;
  private readonly createId: () => string;

  constructor(options: PositionLedgerOptions) {
    this.memory = options.memory;
    this.risk = options.risk;
    this.bus = options.bus;
    this.historyLimit = Math.max(1, options.historyLimit ?? 1000);
    this.now = options.now ?? Date.now;
    this.createId = options.createId ?? (() => nanoid());
  }

  open(input: OpenPositionInput): OpenResult {
    const { symbol, side, quantity, entryPrice, stops } = input;

    if (!Number.isFinite(quantity) || quantity <= 0) {
      log.warn({ symbol, quantity }, "Rejected position with non-positive quantity");
      return { ok: false, error: "invalid_quantity" };
    }
    if (!Number.isFinite(entryPrice) || entryPrice <= 0) {
      log.warn({ symbol, entryPrice }, "Rejected position with invalid entry price");
      return { ok: false, error: "invalid_price" };
    }
    if (!validStops(side, entryPrice, stops)) {
      log.warn({ symbol, side, entryPrice, stops }, "Rejected position with inconsistent stops");
      return { ok: false, error: "invalid_stops" };
    }

    const position: Position = {
      id: this.createId(),
      symbol,
      side,
      entryPrice,
      quantity,
      entryTime: input.entryTime ?? this.now(),
      stopLoss: stops.stopLoss,
      initialStopLoss: stops.stopLoss,
      emergencyStop: stops.emergencyStop,
      takeProfit: stops.takeProfit,
      lastPrice: entryPrice,
      bestPrice: entryPrice,
      unrealizedPnl: 0,
      pattern: input.pattern,
      status: "open",
      ...(stops.trailingStep !== undefined ? { trailingStep: stops.trailingStep } : {}),
    };

    this.byId.set(position.id, position);
    if (!this.lastPrices.has(symbol)) this.lastPrices.set(symbol, entryPrice);

    log.info(
      { id: position.id, symbol, side, quantity, entryPrice, stopLoss: position.stopLoss, takeProfit: position.takeProfit },
      "Position opened",
    );
    this.bus?.emit("position:opened", copyPosition(position));
    this.refreshRisk();

    return { ok: true, position: copyPosition(position) };
  }

  /**
   * Mark every open position on the symbol and settle those whose exit fired.
   * Exits are checked against the levels in force before this tick, in fixed
   * priority: emergency stop, stop (or trailed stop), take profit.
   */
  onPriceTick(tick: PriceTick): TradeRecord[] {
    const { symbol, price } = tick;
    if (!Number.isFinite(price) || price <= 0) {
      log.warn({ symbol, price }, "Ignoring tick with invalid price");
      return [];
    }

    this.lastPrices.set(symbol, price);

    const affected = Array.from(this.byId.values()).filter((p) => p.symbol === symbol);
    if (affected.length === 0) {
      return [];
    }

    const ts = tick.ts ?? this.now();
    const closed: TradeRecord[] = [];

    for (const position of affected) {
      this.mark(position, price);

      const exit = this.exitFor(position, tick);
      if (exit) {
        closed.push(this.settle(position, exit.price, exit.reason, ts));
        continue;
      }

      this.trail(position, tick);
      this.bus?.emit("position:updated", copyPosition(position));
    }

    return closed;
  }

  /** Close the oldest open position on `symbol`. */
  close(symbol: string, exitPrice: number, reason: ExitReason = "manual"): TradeRecord | null {
    const position = Array.from(this.byId.values()).find((p) => p.symbol === symbol);
    if (!position) {
      log.debug({ symbol }, "No open position to close");
      return null;
    }
    return this.closePosition(position.id, exitPrice, reason);
  }

  closePosition(id: string, exitPrice: number, reason: ExitReason = "manual"): TradeRecord | null {
    const position = this.byId.get(id);
    if (!position) return null;

    if (!Number.isFinite(exitPrice) || exitPrice <= 0) {
      log.warn({ id, exitPrice }, "Refusing to close at invalid price");
      return null;
    }

    this.lastPrices.set(position.symbol, exitPrice);
    this.mark(position, exitPrice);
    return this.settle(position, exitPrice, reason, this.now());
  }

  openPositions(symbol?: string): Position[] {
    return Array.from(this.byId.values())
      .filter((p) => symbol === undefined || p.symbol === symbol)
      .map(copyPosition);
  }

  tradeHistory(): TradeRecord[] {
    return [...this.history];
  }

  prices(): ReadonlyMap<string, number> {
    return new Map(this.lastPrices);
  }

  portfolioSummary(): PortfolioSummary {
    let totalExposure = 0;
    let totalUnrealizedPnl = 0;
    for (const position of this.byId.values()) {
      totalExposure += Math.abs(position.quantity * position.lastPrice);
      totalUnrealizedPnl += position.unrealizedPnl;
    }

    return {
      openCount: this.byId.size,
      totalExposure,
      totalUnrealizedPnl,
      totalRealizedPnl: this.realizedTotal,
    };
  }

  tradeStatistics(): TradeStatistics {
    const pnls = this.history.map((t) => t.realizedPnl);
    const total = pnls.length;
    if (total === 0) {
      return {
        totalTrades: 0,
        winningTrades: 0,
        losingTrades: 0,
        winRate: 0,
        avgPnl: 0,
        maxPnl: 0,
        minPnl: 0,
        pnlStd: 0,
        avgDurationMs: 0,
        maxDrawdown: 0,
      };
    }

    const winningTrades = pnls.filter((p) => p > 0).length;
    const avgPnl = pnls.reduce((sum, p) => sum + p, 0) / total;
    const variance = pnls.reduce((sum, p) => sum + (p - avgPnl) ** 2, 0) / total;

    return {
      totalTrades: total,
      winningTrades,
      losingTrades: pnls.filter((p) => p < 0).length,
      winRate: winningTrades / total,
      avgPnl,
      maxPnl: Math.max(...pnls),
      minPnl: Math.min(...pnls),
      pnlStd: Math.sqrt(variance),
      avgDurationMs: this.history.reduce((sum, t) => sum + t.durationMs, 0) / total,
      maxDrawdown: maxDrawdown(pnls),
    };
  }

  /** Recompute risk metrics from the ledger's current state. */
  refreshRisk(capital?: number): RiskMetrics {
    return this.risk.updateMetrics({
      positions: Array.from(this.byId.values()),
      prices: this.lastPrices,
      trades: this.history,
      ...(capital !== undefined ? { capital } : {}),
    });
  }

  restore(positions: readonly Position[], history: readonly TradeRecord[] = []): void {
    this.byId.clear();
    this.lastPrices.clear();

    for (const position of positions) {
      if (position.status !== "open") continue;
      this.byId.set(position.id, copyPosition(position));
      this.lastPrices.set(position.symbol, position.lastPrice);
    }

    this.history = history.slice(-this.historyLimit);
    this.realizedTotal = history.reduce((sum, t) => sum + t.realizedPnl, 0);

    log.info({ open: this.byId.size, trades: this.history.length }, "Ledger restored");
    this.refreshRisk();
  }

  private mark(position: Position, price: number): void {
    position.lastPrice = price;
    position.unrealizedPnl = (price - position.entryPrice) * position.quantity * sideSign(position.side);
  }

  private exitFor(position: Position, tick: PriceTick): ExitSignal | null {
    const { price } = tick;
    const long = position.side === "long";
    const adverse = long ? Math.min(price, tick.low ?? price) : Math.max(price, tick.high ?? price);
    const favorable = long ? Math.max(price, tick.high ?? price) : Math.min(price, tick.low ?? price);

    const breached = (level: number) => (long ? adverse <= level : adverse >= level);
    const worse = (level: number) => (long ? Math.min(price, level) : Math.max(price, level));
    const better = (level: number) => (long ? Math.max(price, level) : Math.min(price, level));

    if (breached(position.emergencyStop)) {
      return { reason: "emergency_stop", price: worse(position.emergencyStop) };
    }

    if (breached(position.stopLoss)) {
      const trailed = position.stopLoss !== position.initialStopLoss;
      return { reason: trailed ? "trailing_stop" : "stop_loss", price: worse(position.stopLoss) };
    }

    const reached = long ? favorable >= position.takeProfit : favorable <= position.takeProfit;
    if (reached) {
      return { reason: "take_profit", price: better(position.takeProfit) };
    }

    return null;
  }

  /**
   * Ratchet the stop behind the best price at the initial risk distance, in
   * whole trailing steps. The stop never moves against the position and stays
   * at least one step behind the tick's price.
   */
  private trail(position: Position, tick: PriceTick): void {
    const long = position.side === "long";
    const extreme = long ? Math.max(tick.price, tick.high ?? tick.price) : Math.min(tick.price, tick.low ?? tick.price);
    position.bestPrice = long ? Math.max(position.bestPrice, extreme) : Math.min(position.bestPrice, extreme);

    const step = position.trailingStep;
    if (step === undefined) return;

    const riskDistance = Math.abs(position.entryPrice - position.initialStopLoss);
    const candidate = long
      ? Math.min(position.bestPrice - riskDistance, tick.price - step)
      : Math.max(position.bestPrice + riskDistance, tick.price + step);
    const advance = long ? candidate - position.stopLoss : position.stopLoss - candidate;
    if (advance < step) return;

    const shift = long ? advance : -advance;
    position.stopLoss += shift;
    position.emergencyStop += shift;

    log.debug({ id: position.id, stopLoss: position.stopLoss }, "Trailing stop advanced");
  }

  private settle(position: Position, exitPrice: number, reason: ExitReason, at: number): TradeRecord {
    this.byId.delete(position.id);
    position.status = "closed";

    const sign = sideSign(position.side);
    const realizedPnl = (exitPrice - position.entryPrice) * position.quantity * sign;
    const record: TradeRecord = {
      positionId: position.id,
      symbol: position.symbol,
      side: position.side,
      entryPrice: position.entryPrice,
      exitPrice,
      quantity: position.quantity,
      entryTime: position.entryTime,
      exitTime: at,
      durationMs: Math.max(0, at - position.entryTime),
      exitReason: reason,
      realizedPnl,
      returnPct: ((exitPrice - position.entryPrice) / position.entryPrice) * 100 * sign,
      pattern: position.pattern,
    };

    this.history.push(record);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
    this.realizedTotal += realizedPnl;

    this.memory.recordOutcome(position.pattern, realizedPnl, at);
    const patternRecord = this.memory.record(position.pattern);
    if (patternRecord) this.bus?.emit("pattern:updated", patternRecord);

    this.refreshRisk();

    log.info(
      { id: position.id, symbol: position.symbol, reason, exitPrice, realizedPnl },
      "Position closed",
    );
    this.bus?.emit("position:closed", record);

    return record;
  }
}
