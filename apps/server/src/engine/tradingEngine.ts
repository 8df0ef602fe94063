/**
 * Trading engine
 * Composes pattern memory, the trade gate, the risk engine and the position
 * ledger into a single decision pipeline:
 *
 *   signals → gate (pattern history) → sizing → stops → risk veto → order → position
 *
 * Decisions are synchronous and side-effect free. Only order placement
 * suspends, and it goes through a serial lane so the risk check, the order and
 * the position opening of one trade never interleave with another.
 */

import type {
  ExitReason,
  MarketContext,
  PatternRecord,
  PatternReportEntry,
  PortfolioSummary,
  Position,
  PriceTick,
  RiskMetrics,
  Side,
  Signal,
  SignalStats,
  TradeDecision,
  TradeRecord,
  TradeStatistics,
} from "@shared/types/trading";
import { nanoid } from "nanoid";

import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from "../config/engine";
import { ConfigError, EngineError, OrderPlacementError, OrderTimeoutError } from "../errors";
import { createEngineBus, type EngineEventBus } from "../events/engineBus";
import { TradeGate } from "../gate/tradeGate";
import { logger } from "../logger";
import { PatternMemory } from "../patterns/patternMemory";
import { PositionLedger } from "../portfolio/positionLedger";
import { RiskEngine } from "../risk/riskEngine";
import { floorToIncrement } from "../risk/sizing";
import {
  PaperOrderExecutor,
  type FillResult,
  type OrderExecutor,
  type PriceFeed,
  type SignalProvider,
  type VolatilityProvider,
} from "./collaborators";
import { SerialQueue, withOrderTimeout } from "./serialQueue";

const log = logger.child({ component: "tradingEngine" });

export interface TradingEngineOptions {
  config?: EngineConfigInput;
  /** Capital used for metrics until an evaluation supplies its own. */
  capital?: number;
  executor?: OrderExecutor;
  signalProvider?: SignalProvider;
  volatilityProvider?: VolatilityProvider;
  bus?: EngineEventBus;
  now?: () => number;
  createId?: () => string;
}

export interface TradeRequest {
  symbol: string;
  signals: readonly Signal[];
  capital: number;
  context: MarketContext;
}

export interface MarketRequest {
  symbol: string;
  marketData: unknown;
  capital: number;
  side: Side;
  price: number;
  signalStrength: number;
}

export type SubmitResult =
  | { executed: false; decision: TradeDecision }
  | { executed: true; decision: TradeDecision; fill: FillResult; position: Position };

export interface EngineSnapshot {
  patterns: PatternRecord[];
  positions: Position[];
  trades: TradeRecord[];
}

function validContext(symbol: string, capital: number, context: MarketContext): boolean {
  return (
    symbol.trim().length > 0 &&
    Number.isFinite(capital) &&
    capital > 0 &&
    Number.isFinite(context.price) &&
    context.price > 0 &&
    Number.isFinite(context.atr) &&
    Number.isFinite(context.volatility) &&
    Number.isFinite(context.signalStrength)
  );
}

export class TradingEngine {
  readonly config: EngineConfig;
  readonly bus: EngineEventBus;
  readonly memory: PatternMemory;
  readonly gate: TradeGate;
  readonly risk: RiskEngine;
  readonly ledger: PositionLedger;
  private readonly executor: OrderExecutor;
  private readonly signalProvider: SignalProvider | undefined;
  private readonly volatilityProvider: VolatilityProvider | undefined;
  private readonly orders = new SerialQueue();

  constructor(options: TradingEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.bus = options.bus ?? createEngineBus();
    const now = options.now ?? Date.now;

    this.memory = new PatternMemory({ ...this.config.memory, now });
    this.gate = new TradeGate(this.memory, this.config.gate);
    this.risk = new RiskEngine({
      config: this.config.risk,
      capital: options.capital ?? 0,
      bus: this.bus,
      now,
    });
    this.ledger = new PositionLedger({
      memory: this.memory,
      risk: this.risk,
      bus: this.bus,
      historyLimit: this.config.historyLimit,
      now,
      ...(options.createId ? { createId: options.createId } : {}),
    });
    this.executor = options.executor ?? new PaperOrderExecutor({ slippage: this.config.paperSlippage, now });
    this.signalProvider = options.signalProvider;
    this.volatilityProvider = options.volatilityProvider;
  }

  /**
   * Decide whether `signals` may trade `symbol` now, and at what size and stops.
   * Rejections are returned as values; nothing is opened or recorded.
   */
  evaluateTrade(
    symbol: string,
    signals: readonly Signal[],
    capital: number,
    context: MarketContext,
  ): TradeDecision {
    const pattern = this.memory.identify(signals);
    const base = {
      symbol,
      side: context.side,
      pattern,
      tradeScore: this.memory.tradeScore(pattern),
      probability: this.memory.probability(pattern),
    };
    const emit = (decision: TradeDecision): TradeDecision => {
      log.debug(
        {
          symbol,
          pattern: pattern.key,
          approved: decision.approved,
          reason: decision.reason,
          tradeScore: decision.tradeScore,
        },
        "Trade evaluated",
      );
      this.bus.emit("decision:evaluated", decision);
      return decision;
    };

    if (!validContext(symbol, capital, context)) {
      return emit({ ...base, approved: false, reason: "invalid_input" });
    }

    const metrics = this.ledger.refreshRisk(capital);

    const gate = this.gate.evaluate(pattern.signals);
    if (!gate.approved) {
      return emit({ ...base, approved: false, reason: gate.reason });
    }

    const sizeHint = this.risk.sizePosition(
      capital,
      context.signalStrength,
      context.volatility,
      metrics.currentExposure,
    );
    if (sizeHint <= 0) {
      return emit({ ...base, approved: false, reason: "insufficient_size", sizeHint });
    }

    const stops = this.risk.computeStops(context.price, context.side, context.atr, context.volatility);
    if (!stops) {
      return emit({ ...base, approved: false, reason: "invalid_stops", sizeHint });
    }

    const quantity = floorToIncrement(sizeHint / context.price, this.config.quantityIncrement);
    if (quantity <= 0) {
      return emit({ ...base, approved: false, reason: "insufficient_size", sizeHint, stops });
    }

    const check = this.risk.checkOpenPosition(symbol, sizeHint, capital);
    if (!check.allowed) {
      return emit({
        ...base,
        approved: false,
        reason: "risk_limit_exceeded",
        sizeHint,
        quantity,
        stops,
        ...(check.veto ? { riskVeto: check.veto } : {}),
      });
    }

    return emit({ ...base, approved: true, reason: gate.reason, sizeHint, quantity, stops });
  }

  /** Evaluate with signals and volatility pulled from the configured providers. */
  async evaluateMarket(request: MarketRequest): Promise<TradeDecision> {
    if (!this.signalProvider || !this.volatilityProvider) {
      throw new ConfigError("evaluateMarket requires a signal provider and a volatility provider");
    }

    const [signals, atr, volatility] = await Promise.all([
      this.signalProvider.evaluate(request.marketData),
      this.volatilityProvider.atr(request.symbol),
      this.volatilityProvider.volatility(request.symbol),
    ]);

    return this.evaluateTrade(request.symbol, signals, request.capital, {
      side: request.side,
      price: request.price,
      atr,
      volatility,
      signalStrength: request.signalStrength,
    });
  }

  /**
   * Evaluate and, when approved, place the order and open the position at the
   * fill. Executor failures and timeouts reject and leave engine state as it was.
   */
  submitTrade(request: TradeRequest): Promise<SubmitResult> {
    return this.orders.run(async () => {
      const { symbol, signals, capital, context } = request;
      const decision = this.evaluateTrade(symbol, signals, capital, context);
      if (!decision.approved || decision.quantity === undefined || !decision.stops) {
        return { executed: false, decision };
      }

      const fill = await this.place(symbol, context.side, decision.quantity, context.price);
      this.risk.recordOrder(symbol, fill.filledAt);

      // Keep the stop distances priced at decision time, anchored on the fill
      const stops =
        this.risk.computeStops(fill.price, context.side, context.atr, context.volatility) ?? decision.stops;
      const opened = this.ledger.open({
        symbol,
        side: context.side,
        quantity: fill.quantity,
        entryPrice: fill.price,
        stops,
        pattern: decision.pattern,
        entryTime: fill.filledAt,
      });

      if (!opened.ok) {
        log.error({ symbol, orderId: fill.orderId, error: opened.error }, "Filled order could not open a position");
        throw new EngineError(
          `Order ${fill.orderId} filled but the position was rejected (${opened.error})`,
          "POSITION_REJECTED",
        );
      }

      return { executed: true, decision, fill, position: opened.position };
    });
  }

  onPriceTick(tick: PriceTick): TradeRecord[] {
    return this.ledger.onPriceTick(tick);
  }

  /** Route every tick from `feed` into the ledger; returns the unsubscribe function. */
  connectPriceFeed(feed: PriceFeed): () => void {
    return feed.onTick((tick) => {
      this.onPriceTick(tick);
    });
  }

  close(symbol: string, exitPrice: number, reason: ExitReason = "manual"): TradeRecord | null {
    return this.ledger.close(symbol, exitPrice, reason);
  }

  positions(symbol?: string): Position[] {
    return this.ledger.openPositions(symbol);
  }

  portfolioSummary(): PortfolioSummary {
    return this.ledger.portfolioSummary();
  }

  patternReport(): PatternReportEntry[] {
    return this.memory.report();
  }

  signalReport(): SignalStats[] {
    return this.memory.signalReport();
  }

  riskMetrics(): RiskMetrics {
    return this.ledger.refreshRisk();
  }

  shouldReduceExposure(): boolean {
    return this.risk.shouldReduceExposure();
  }

  tradeStatistics(): TradeStatistics {
    return this.ledger.tradeStatistics();
  }

  tradeHistory(): TradeRecord[] {
    return this.ledger.tradeHistory();
  }

  snapshot(): EngineSnapshot {
    return {
      patterns: this.memory.snapshot(),
      positions: this.ledger.openPositions(),
      trades: this.ledger.tradeHistory(),
    };
  }

  restore(snapshot: EngineSnapshot): void {
    this.memory.restore(snapshot.patterns);
    this.ledger.restore(snapshot.positions, snapshot.trades);
  }

  /** Resolves once every queued order has settled. */
  async drain(): Promise<void> {
    await this.orders.drain();
  }

  private async place(symbol: string, side: Side, quantity: number, referencePrice: number): Promise<FillResult> {
    const request = { clientOrderId: nanoid(), symbol, side, quantity, referencePrice };
    try {
      return await withOrderTimeout(this.executor.place(request), symbol, this.config.orderTimeoutMs);
    } catch (err) {
      if (err instanceof OrderTimeoutError) {
        log.error({ symbol, timeoutMs: err.timeoutMs }, "Order placement timed out");
        throw err;
      }
      log.error({ symbol, err }, "Order placement failed");
      throw new OrderPlacementError(symbol, { cause: err });
    }
  }
}

export function createTradingEngine(options: TradingEngineOptions = {}): TradingEngine {
  return new TradingEngine(options);
}
