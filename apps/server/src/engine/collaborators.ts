/**
 * External collaborators of the trading engine. Signal generation, volatility
 * estimation, exchange connectivity and price feeds live outside the engine
 * and are reached only through these interfaces.
 */

import { nanoid } from "nanoid";
import type { PriceTick, Side, Signal } from "@shared/types/trading";

import { logger } from "../logger";

const log = logger.child({ component: "paperExecutor" });

export interface SignalProvider<TMarketData = unknown> {
  evaluate(marketData: TMarketData): Signal[] | Promise<Signal[]>;
}

export interface VolatilityProvider {
  atr(symbol: string): number | Promise<number>;
  /** Normalised volatility, e.g. 0.02 for 2%. */
  volatility(symbol: string): number | Promise<number>;
}

export interface OrderRequest {
  clientOrderId: string;
  symbol: string;
  side: Side;
  quantity: number;
  /** Price the decision was sized against. */
  referencePrice: number;
}

export interface FillResult {
  orderId: string;
  price: number;
  quantity: number;
  filledAt: number;
}

export interface OrderExecutor {
  place(request: OrderRequest): Promise<FillResult>;
}

export type TickListener = (tick: PriceTick) => void;

export interface PriceFeed {
  /** Subscribe to ticks; returns the unsubscribe function. */
  onTick(listener: TickListener): () => void;
}

export interface PaperOrderExecutorOptions {
  /** Fractional slippage applied against the order side. */
  slippage?: number;
  now?: () => number;
}

/**
 * Simulated executor: fills the full quantity immediately at the reference
 * price moved against the trader by `slippage`.
 */
export class PaperOrderExecutor implements OrderExecutor {
  private readonly slippage: number;
  private readonly now: () => number;
  private fills: FillResult[] = [];

  constructor(options: PaperOrderExecutorOptions = {}) {
    this.slippage = options.slippage ?? 0.001;
    this.now = options.now ?? Date.now;
  }

  async place(request: OrderRequest): Promise<FillResult> {
    const { symbol, side, quantity, referencePrice } = request;
    if (!(quantity > 0) || !(referencePrice > 0)) {
      throw new Error(`Paper order rejected: quantity ${quantity} @ ${referencePrice}`);
    }

    const direction = side === "long" ? 1 : -1;
    const fill: FillResult = {
      orderId: `paper-${nanoid(10)}`,
      price: referencePrice * (1 + direction * this.slippage),
      quantity,
      filledAt: this.now(),
    };

    this.fills.push(fill);
    log.info({ symbol, side, quantity, price: fill.price, orderId: fill.orderId }, "Paper order filled");
    return fill;
  }

  getFills(): FillResult[] {
    return [...this.fills];
  }
}

/** In-process feed; `publish` delivers a tick to every subscriber. */
export class ManualPriceFeed implements PriceFeed {
  private listeners = new Set<TickListener>();

  onTick(listener: TickListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(tick: PriceTick): void {
    for (const listener of this.listeners) {
      listener(tick);
    }
  }
}
