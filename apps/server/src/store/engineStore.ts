import type { PatternRecord, Position, TradeRecord } from "@shared/types/trading";

/**
 * Durable home for engine state. Implementations must tolerate repeated
 * writes of the same entity (every save is an upsert).
 */
export interface EngineStore {
  loadPatterns(): Promise<PatternRecord[]>;
  loadOpenPositions(): Promise<Position[]>;
  /** Most recent `limit` trades, oldest first. */
  loadTrades(limit: number): Promise<TradeRecord[]>;
  savePattern(record: PatternRecord): Promise<void>;
  savePosition(position: Position): Promise<void>;
  /** Store the trade and retire its open position. */
  saveTrade(trade: TradeRecord): Promise<void>;
}

function copyRecord(record: PatternRecord): PatternRecord {
  return {
    pattern: record.pattern,
    stats: { ...record.stats, recentOutcomes: [...record.stats.recentOutcomes] },
  };
}

/** Process-local store for tests and database-less runs. */
export class MemoryEngineStore implements EngineStore {
  private patterns = new Map<string, PatternRecord>();
  private positions = new Map<string, Position>();
  private trades = new Map<string, TradeRecord>();

  async loadPatterns(): Promise<PatternRecord[]> {
    return Array.from(this.patterns.values()).map(copyRecord);
  }

  async loadOpenPositions(): Promise<Position[]> {
    return Array.from(this.positions.values())
      .filter((p) => p.status === "open")
      .map((p) => ({ ...p }));
  }

  async loadTrades(limit: number): Promise<TradeRecord[]> {
    return Array.from(this.trades.values())
      .sort((a, b) => a.exitTime - b.exitTime)
      .slice(-limit)
      .map((t) => ({ ...t }));
  }

  async savePattern(record: PatternRecord): Promise<void> {
    this.patterns.set(record.pattern.key, copyRecord(record));
  }

  async savePosition(position: Position): Promise<void> {
    const existing = this.positions.get(position.id);
    // A late update must not reopen a position that has already closed
    if (existing?.status === "closed") return;
    this.positions.set(position.id, { ...position });
  }

  async saveTrade(trade: TradeRecord): Promise<void> {
    this.trades.set(trade.positionId, { ...trade });
    const position = this.positions.get(trade.positionId);
    if (position) {
      this.positions.set(trade.positionId, { ...position, status: "closed", lastPrice: trade.exitPrice });
    }
  }
}
