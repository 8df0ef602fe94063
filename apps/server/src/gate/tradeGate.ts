import type { GateReason, Pattern, Signal } from "@shared/types/trading";

import type { PatternMemory } from "../patterns/patternMemory";

export type UnseenPatternPolicy = "explore" | "deny";

export interface TradeGateConfig {
  minSignals: number;
  minSampleSize: number;
  minWinRate: number;
  maxConsecutiveLosses: number;
  unseenPatternPolicy: UnseenPatternPolicy;
  /** Floor on the mean signal weight of an approved pattern. 0 = off. */
  minTradeScore: number;
  /**
   * Once more than this many signal observations exist, the floor rises to
   * 1.5 + 0.5 × the overall signal win rate. 0 = off.
   */
  adaptiveScoreAfter: number;
}

export const DEFAULT_TRADE_GATE_CONFIG: TradeGateConfig = {
  minSignals: 2,
  minSampleSize: 5,
  minWinRate: 0.4,
  maxConsecutiveLosses: 3,
  unseenPatternPolicy: "explore",
  minTradeScore: 0,
  adaptiveScoreAfter: 0,
};

export interface GateDecision {
  approved: boolean;
  reason: GateReason;
  pattern: Pattern;
  observations: number;
  winRate: number | null;
  /** Mean learned weight of the pattern's signals, in [0, 2]. */
  tradeScore: number;
  probability: number;
}

/**
 * Decides whether a signal set may trade, based only on the history of its
 * pattern. Read-only against pattern memory; callers record outcomes.
 *
 * Absence of history approves (exploration) unless the policy says otherwise,
 * so that new patterns can accumulate statistics at all.
 */
export class TradeGate {
  private config: TradeGateConfig;

  constructor(
    private readonly memory: PatternMemory,
    config?: Partial<TradeGateConfig>,
  ) {
    this.config = { ...DEFAULT_TRADE_GATE_CONFIG, ...config };
  }

  getConfig(): TradeGateConfig {
    return { ...this.config };
  }

  evaluate(signals: Iterable<Signal>): GateDecision {
    const pattern = this.memory.identify(signals);
    const observations = this.memory.totalObservations(pattern);
    const winRate = this.memory.winRate(pattern);
    const tradeScore = this.memory.tradeScore(pattern);
    const decide = (approved: boolean, reason: GateReason): GateDecision => ({
      approved,
      reason,
      pattern,
      observations,
      winRate,
      tradeScore,
      probability: this.memory.probability(pattern),
    });

    const [approved, reason] = this.patternVerdict(pattern, observations, winRate);
    if (approved && tradeScore < this.scoreFloor()) {
      return decide(false, "low_trade_score");
    }
    return decide(approved, reason);
  }

  /** Effective minimum trade score right now. */
  scoreFloor(): number {
    const { minTradeScore, adaptiveScoreAfter } = this.config;
    if (adaptiveScoreAfter > 0) {
      const { wins, total } = this.memory.signalTotals();
      if (total > adaptiveScoreAfter) {
        return Math.max(minTradeScore, 1.5 + (wins / total) * 0.5);
      }
    }
    return minTradeScore;
  }

  private patternVerdict(
    pattern: Pattern,
    observations: number,
    winRate: number | null,
  ): [boolean, GateReason] {
    if (pattern.signals.length < this.config.minSignals) {
      return [false, "insufficient_signals"];
    }

    if (observations === 0 || winRate === null) {
      return this.config.unseenPatternPolicy === "deny"
        ? [false, "unseen_pattern_denied"]
        : [true, "unseen_pattern"];
    }

    if (observations < this.config.minSampleSize) {
      return [true, "exploring"];
    }

    if (winRate < this.config.minWinRate) {
      return [false, "low_win_rate"];
    }

    const stats = this.memory.stats(pattern);
    if (stats && stats.consecutiveLosses >= this.config.maxConsecutiveLosses) {
      return [false, "consecutive_losses"];
    }

    return [true, "pattern_approved"];
  }
}
