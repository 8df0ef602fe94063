/**
 * Persistence sync
 * Mirrors engine events into an EngineStore. Writes run one at a time in event
 * order; tick-driven position updates are coalesced so a burst of ticks costs
 * one write per position.
 */

import type { Position } from "@shared/types/trading";

import { SerialQueue } from "../engine/serialQueue";
import type { TradingEngine } from "../engine/tradingEngine";
import type { EngineEventBus, EngineEventMap } from "../events/engineBus";
import { logger } from "../logger";
import type { EngineStore } from "./engineStore";

const log = logger.child({ component: "persistence" });

export class PersistenceSync {
  private queue = new SerialQueue();
  private pendingPositions = new Map<string, Position>();
  private flushScheduled = false;
  private unsubscribers: Array<() => void> = [];
  private failures = 0;

  constructor(
    private readonly store: EngineStore,
    private readonly bus: EngineEventBus,
  ) {}

  start(): void {
    if (this.unsubscribers.length > 0) return;

    this.listen("position:opened", (position) => {
      this.enqueue("savePosition", () => this.store.savePosition(position));
    });
    this.listen("position:updated", (position) => {
      this.pendingPositions.set(position.id, position);
      this.schedulePositionFlush();
    });
    this.listen("position:closed", (trade) => {
      this.pendingPositions.delete(trade.positionId);
      this.enqueue("saveTrade", () => this.store.saveTrade(trade));
    });
    this.listen("pattern:updated", (record) => {
      this.enqueue("savePattern", () => this.store.savePattern(record));
    });

    log.info("Persistence sync started");
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  /** Resolves once every write queued so far has settled. */
  async flush(): Promise<void> {
    await this.queue.drain();
  }

  getStats() {
    return { ...this.queue.getStats(), pendingPositions: this.pendingPositions.size, failures: this.failures };
  }

  private listen<K extends keyof EngineEventMap>(event: K, listener: (data: EngineEventMap[K]) => void): void {
    this.bus.on(event, listener);
    this.unsubscribers.push(() => {
      this.bus.off(event, listener);
    });
  }

  private schedulePositionFlush(): void {
    if (this.flushScheduled) return;
    this.flushScheduled = true;

    this.enqueue("savePositions", async () => {
      this.flushScheduled = false;
      const batch = Array.from(this.pendingPositions.values());
      this.pendingPositions.clear();
      for (const position of batch) {
        await this.store.savePosition(position);
      }
    });
  }

  private enqueue(operation: string, task: () => Promise<void>): void {
    this.queue.run(task).catch((err: unknown) => {
      this.failures++;
      log.error({ operation, err }, "Failed to persist engine state");
    });
  }
}

export interface HydrateResult {
  patterns: number;
  positions: number;
  trades: number;
}

/** Load persisted state into a freshly constructed engine. */
export async function hydrateEngine(engine: TradingEngine, store: EngineStore): Promise<HydrateResult> {
  const [patterns, positions, trades] = await Promise.all([
    store.loadPatterns(),
    store.loadOpenPositions(),
    store.loadTrades(engine.config.historyLimit),
  ]);

  engine.restore({ patterns, positions, trades });

  const result = { patterns: patterns.length, positions: positions.length, trades: trades.length };
  log.info(result, "Engine state hydrated");
  return result;
}
