/**
 * Pattern memory
 * Remembers how each canonical signal combination has played out and feeds
 * the trade gate. Stats live in a dense slot array indexed by pattern key.
 */

import type {
  OutcomeResult,
  Pattern,
  PatternRecord,
  PatternReportEntry,
  PatternStats,
  Signal,
  SignalStats,
} from "@shared/types/trading";

import { logger } from "../logger";

const log = logger.child({ component: "patternMemory" });

/** Weight of a signal that has no resolved trades yet (a 50% win rate). */
export const NEUTRAL_SIGNAL_WEIGHT = 1;

export interface PatternMemoryOptions {
  /** Realized returns kept per pattern (FIFO). */
  recentCapacity?: number;
  /** Cap on distinct patterns; least recently updated is evicted. 0 = unbounded. */
  maxPatterns?: number;
  now?: () => number;
}

interface PatternSlot {
  pattern: Pattern;
  stats: PatternStats;
}

/**
 * Canonical form of a signal set: sorted, duplicate-free, keyed by its JSON
 * serialisation so that no label content can make two different sets collide.
 */
export function canonicalPattern(signals: Iterable<Signal>): Pattern {
  const unique = Array.from(new Set(signals)).sort();
  return Object.freeze({ key: JSON.stringify(unique), signals: Object.freeze(unique) });
}

function emptyStats(at: number): PatternStats {
  return {
    wins: 0,
    losses: 0,
    consecutiveLosses: 0,
    lastResult: "unknown",
    recentOutcomes: [],
    firstSeenAt: at,
    updatedAt: at,
  };
}

function copyStats(stats: PatternStats): PatternStats {
  return { ...stats, recentOutcomes: [...stats.recentOutcomes] };
}

export class PatternMemory {
  private index = new Map<string, number>();
  private slots: PatternSlot[] = [];
  private signalStats = new Map<Signal, SignalStats>();
  private readonly recentCapacity: number;
  private readonly maxPatterns: number;
  private readonly now: () => number;

  constructor(options: PatternMemoryOptions = {}) {
    this.recentCapacity = Math.max(1, options.recentCapacity ?? 5);
    this.maxPatterns = Math.max(0, options.maxPatterns ?? 0);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.slots.length;
  }

  identify(signals: Iterable<Signal>): Pattern {
    return canonicalPattern(signals);
  }

  recordOutcome(pattern: Pattern, profit: number, at: number = this.now()): PatternStats {
    const slot = this.slotFor(pattern, at);
    const { stats } = slot;
    const result: OutcomeResult = profit > 0 ? "win" : "loss";

    if (result === "win") {
      stats.wins++;
      stats.consecutiveLosses = 0;
    } else {
      stats.losses++;
      stats.consecutiveLosses = stats.lastResult === "loss" ? stats.consecutiveLosses + 1 : 1;
    }

    stats.lastResult = result;
    stats.recentOutcomes.push(profit);
    if (stats.recentOutcomes.length > this.recentCapacity) {
      stats.recentOutcomes.splice(0, stats.recentOutcomes.length - this.recentCapacity);
    }
    stats.updatedAt = at;

    for (const signal of slot.pattern.signals) {
      this.recordSignal(signal, result === "win");
    }

    log.debug(
      { pattern: slot.pattern.key, result, profit, wins: stats.wins, losses: stats.losses },
      "Pattern outcome recorded",
    );

    return copyStats(stats);
  }

  stats(pattern: Pattern): PatternStats | undefined {
    const slot = this.lookup(pattern);
    return slot ? copyStats(slot.stats) : undefined;
  }

  totalObservations(pattern: Pattern): number {
    const slot = this.lookup(pattern);
    return slot ? slot.stats.wins + slot.stats.losses : 0;
  }

  /** `null` means the pattern has never resolved a trade, which is not a 0% win rate. */
  winRate(pattern: Pattern): number | null {
    const slot = this.lookup(pattern);
    if (!slot) return null;
    const total = slot.stats.wins + slot.stats.losses;
    return total > 0 ? slot.stats.wins / total : null;
  }

  averageRecentOutcome(pattern: Pattern): number | null {
    const slot = this.lookup(pattern);
    if (!slot || slot.stats.recentOutcomes.length === 0) return null;
    const sum = slot.stats.recentOutcomes.reduce((acc, v) => acc + v, 0);
    return sum / slot.stats.recentOutcomes.length;
  }

  report(): PatternReportEntry[] {
    return this.slots
      .map(({ pattern, stats }) => {
        const total = stats.wins + stats.losses;
        return {
          key: pattern.key,
          signals: pattern.signals,
          wins: stats.wins,
          losses: stats.losses,
          total,
          winRate: total > 0 ? stats.wins / total : null,
          consecutiveLosses: stats.consecutiveLosses,
          lastResult: stats.lastResult,
          avgRecentOutcome: this.averageRecentOutcome(pattern),
          updatedAt: stats.updatedAt,
        };
      })
      .sort((a, b) => b.total - a.total || a.key.localeCompare(b.key));
  }

  signalReport(): SignalStats[] {
    return Array.from(this.signalStats.values())
      .map((s) => ({ ...s }))
      .sort((a, b) => b.weight - a.weight || a.signal.localeCompare(b.signal));
  }

  /** Learned weight in [0, 2]: twice the signal's win rate across every pattern it appeared in. */
  signalWeight(signal: Signal): number {
    const entry = this.signalStats.get(signal);
    return entry && entry.total > 0 ? entry.weight : NEUTRAL_SIGNAL_WEIGHT;
  }

  tradeScore(pattern: Pattern): number {
    if (pattern.signals.length === 0) return NEUTRAL_SIGNAL_WEIGHT;
    const sum = pattern.signals.reduce((acc, signal) => acc + this.signalWeight(signal), 0);
    return sum / pattern.signals.length;
  }

  /** Signals without history leave the estimate unchanged. */
  probability(pattern: Pattern): number {
    let probability = 0.5;
    for (const signal of pattern.signals) {
      const entry = this.signalStats.get(signal);
      if (entry && entry.total > 0) probability *= entry.weight;
    }
    return Math.min(1, probability);
  }

  signalTotals(): { wins: number; total: number } {
    let wins = 0;
    let total = 0;
    for (const entry of this.signalStats.values()) {
      wins += entry.wins;
      total += entry.total;
    }
    return { wins, total };
  }

  record(pattern: Pattern): PatternRecord | undefined {
    const slot = this.lookup(pattern);
    return slot ? { pattern: slot.pattern, stats: copyStats(slot.stats) } : undefined;
  }

  snapshot(): PatternRecord[] {
    return this.slots.map(({ pattern, stats }) => ({ pattern, stats: copyStats(stats) }));
  }

  /**
   * Replace the current contents with persisted records.
   * Keys are recomputed from the signals so stale or foreign keys never leak in.
   */
  restore(records: readonly PatternRecord[]): void {
    this.index.clear();
    this.slots = [];
    this.signalStats.clear();

    for (const record of records) {
      const pattern = canonicalPattern(record.pattern.signals);
      const stats = copyStats(record.stats);
      if (stats.recentOutcomes.length > this.recentCapacity) {
        stats.recentOutcomes = stats.recentOutcomes.slice(-this.recentCapacity);
      }

      const existing = this.index.get(pattern.key);
      if (existing !== undefined) {
        this.slots[existing] = { pattern, stats };
      } else {
        this.index.set(pattern.key, this.slots.length);
        this.slots.push({ pattern, stats });
      }
    }

    this.enforceCapacity();

    // Signal weights are derived data; rebuild them from pattern totals
    for (const { pattern, stats } of this.slots) {
      for (const signal of pattern.signals) {
        const entry = this.signalEntry(signal);
        entry.wins += stats.wins;
        entry.total += stats.wins + stats.losses;
        entry.weight = entry.total > 0 ? (entry.wins / entry.total) * 2 : 0;
      }
    }

    log.info({ patterns: this.slots.length }, "Pattern memory restored");
  }

  private lookup(pattern: Pattern): PatternSlot | undefined {
    const idx = this.index.get(pattern.key) ?? this.index.get(canonicalPattern(pattern.signals).key);
    return idx === undefined ? undefined : this.slots[idx];
  }

  private slotFor(pattern: Pattern, at: number): PatternSlot {
    const canonical = canonicalPattern(pattern.signals);
    const idx = this.index.get(canonical.key);
    const existing = idx === undefined ? undefined : this.slots[idx];
    if (existing) return existing;

    const slot: PatternSlot = { pattern: canonical, stats: emptyStats(at) };
    this.index.set(slot.pattern.key, this.slots.length);
    this.slots.push(slot);
    this.enforceCapacity(slot.pattern.key);
    return slot;
  }

  private enforceCapacity(keep?: string): void {
    if (this.maxPatterns === 0) return;

    while (this.slots.length > this.maxPatterns) {
      let victim = -1;
      for (let i = 0; i < this.slots.length; i++) {
        const candidate = this.slots[i];
        if (!candidate || candidate.pattern.key === keep) continue;
        const current = victim >= 0 ? this.slots[victim] : undefined;
        if (!current || candidate.stats.updatedAt < current.stats.updatedAt) {
          victim = i;
        }
      }
      if (victim < 0) return;
      this.removeAt(victim);
    }
  }

  // Swap-remove keeps the slot array dense
  private removeAt(idx: number): void {
    const removed = this.slots[idx];
    const last = this.slots.pop();
    if (!removed || !last) return;

    this.index.delete(removed.pattern.key);
    this.forgetSignals(removed);
    if (last !== removed) {
      this.slots[idx] = last;
      this.index.set(last.pattern.key, idx);
    }
    log.debug({ pattern: removed.pattern.key }, "Pattern evicted");
  }

  private forgetSignals({ pattern, stats }: PatternSlot): void {
    for (const signal of pattern.signals) {
      const entry = this.signalStats.get(signal);
      if (!entry) continue;
      entry.wins = Math.max(0, entry.wins - stats.wins);
      entry.total = Math.max(0, entry.total - (stats.wins + stats.losses));
      if (entry.total === 0) {
        this.signalStats.delete(signal);
      } else {
        entry.weight = (entry.wins / entry.total) * 2;
      }
    }
  }

  private recordSignal(signal: Signal, won: boolean): void {
    const entry = this.signalEntry(signal);
    entry.total++;
    if (won) entry.wins++;
    entry.weight = (entry.wins / entry.total) * 2;
  }

  private signalEntry(signal: Signal): SignalStats {
    let entry = this.signalStats.get(signal);
    if (!entry) {
      entry = { signal, wins: 0, total: 0, weight: 0 };
      this.signalStats.set(signal, entry);
    }
    return entry;
  }
}
