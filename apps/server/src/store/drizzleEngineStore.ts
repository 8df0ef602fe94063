import type { PatternRecord, Position, TradeRecord } from "@shared/types/trading";
import { desc, eq } from "drizzle-orm";

import type { Database } from "../db";
import { patternStats, positions, trades } from "../db/schema";
import { canonicalPattern } from "../patterns/patternMemory";
import type { EngineStore } from "./engineStore";

type PatternRow = typeof patternStats.$inferSelect;
type PositionRow = typeof positions.$inferSelect;
type TradeRow = typeof trades.$inferSelect;

function toPatternRecord(row: PatternRow): PatternRecord {
  return {
    pattern: canonicalPattern(row.signals),
    stats: {
      wins: row.wins,
      losses: row.losses,
      consecutiveLosses: row.consecutiveLosses,
      lastResult: row.lastResult,
      recentOutcomes: row.recentOutcomes,
      firstSeenAt: row.firstSeenAt.getTime(),
      updatedAt: row.updatedAt.getTime(),
    },
  };
}

function toPosition(row: PositionRow): Position {
  return {
    id: row.id,
    symbol: row.symbol,
    side: row.side,
    entryPrice: row.entryPrice,
    quantity: row.quantity,
    entryTime: row.entryTime.getTime(),
    stopLoss: row.stopLoss,
    initialStopLoss: row.initialStopLoss,
    emergencyStop: row.emergencyStop,
    takeProfit: row.takeProfit,
    lastPrice: row.lastPrice,
    bestPrice: row.bestPrice,
    unrealizedPnl: row.unrealizedPnl,
    pattern: canonicalPattern(row.patternSignals),
    status: row.status,
    ...(row.trailingStep !== null ? { trailingStep: row.trailingStep } : {}),
  };
}

function toTrade(row: TradeRow): TradeRecord {
  return {
    positionId: row.positionId,
    symbol: row.symbol,
    side: row.side,
    entryPrice: row.entryPrice,
    exitPrice: row.exitPrice,
    quantity: row.quantity,
    entryTime: row.entryTime.getTime(),
    exitTime: row.exitTime.getTime(),
    durationMs: row.durationMs,
    exitReason: row.exitReason,
    realizedPnl: row.realizedPnl,
    returnPct: row.returnPct,
    pattern: canonicalPattern(row.patternSignals),
  };
}

/** Postgres-backed store (Neon over HTTP). */
export class DrizzleEngineStore implements EngineStore {
  constructor(private readonly db: Database) {}

  async loadPatterns(): Promise<PatternRecord[]> {
    const rows = await this.db.select().from(patternStats);
    return rows.map(toPatternRecord);
  }

  async loadOpenPositions(): Promise<Position[]> {
    const rows = await this.db
      .select()
      .from(positions)
      .where(eq(positions.status, "open"))
      .orderBy(positions.entryTime);
    return rows.map(toPosition);
  }

  async loadTrades(limit: number): Promise<TradeRecord[]> {
    const rows = await this.db.select().from(trades).orderBy(desc(trades.exitTime)).limit(limit);
    return rows.reverse().map(toTrade);
  }

  async savePattern(record: PatternRecord): Promise<void> {
    const { pattern, stats } = record;
    const values = {
      wins: stats.wins,
      losses: stats.losses,
      consecutiveLosses: stats.consecutiveLosses,
      lastResult: stats.lastResult,
      recentOutcomes: stats.recentOutcomes,
      updatedAt: new Date(stats.updatedAt),
    };

    await this.db
      .insert(patternStats)
      .values({
        key: pattern.key,
        signals: [...pattern.signals],
        firstSeenAt: new Date(stats.firstSeenAt),
        ...values,
      })
      .onConflictDoUpdate({ target: patternStats.key, set: values });
  }

  async savePosition(position: Position): Promise<void> {
    const mutable = {
      stopLoss: position.stopLoss,
      emergencyStop: position.emergencyStop,
      lastPrice: position.lastPrice,
      bestPrice: position.bestPrice,
      unrealizedPnl: position.unrealizedPnl,
      status: position.status,
    };

    await this.db
      .insert(positions)
      .values({
        id: position.id,
        symbol: position.symbol,
        side: position.side,
        entryPrice: position.entryPrice,
        quantity: position.quantity,
        entryTime: new Date(position.entryTime),
        initialStopLoss: position.initialStopLoss,
        takeProfit: position.takeProfit,
        trailingStep: position.trailingStep ?? null,
        patternSignals: [...position.pattern.signals],
        ...mutable,
      })
      .onConflictDoUpdate({
        target: positions.id,
        set: mutable,
        setWhere: eq(positions.status, "open"),
      });
  }

  async saveTrade(trade: TradeRecord): Promise<void> {
    await this.db
      .insert(trades)
      .values({
        positionId: trade.positionId,
        symbol: trade.symbol,
        side: trade.side,
        entryPrice: trade.entryPrice,
        exitPrice: trade.exitPrice,
        quantity: trade.quantity,
        entryTime: new Date(trade.entryTime),
        exitTime: new Date(trade.exitTime),
        durationMs: trade.durationMs,
        exitReason: trade.exitReason,
        realizedPnl: trade.realizedPnl,
        returnPct: trade.returnPct,
        patternSignals: [...trade.pattern.signals],
      })
      .onConflictDoNothing({ target: trades.positionId });

    await this.db
      .update(positions)
      .set({ status: "closed", lastPrice: trade.exitPrice })
      .where(eq(positions.id, trade.positionId));
  }
}
