// Domain types shared by the engine, its HTTP surface and any dashboard client

/** Discrete technical-analysis observation, e.g. "RSI_OVERSOLD". */
export type Signal = string;

export type Side = "long" | "short";

export type OutcomeResult = "win" | "loss" | "unknown";

export type PositionStatus = "open" | "closed";

export type ExitReason =
  | "emergency_stop"
  | "stop_loss"
  | "trailing_stop"
  | "take_profit"
  | "manual";

/**
 * Canonical, order-independent set of signals observed at one decision point.
 * `key` is the identity; `signals` is sorted and duplicate-free.
 */
export interface Pattern {
  readonly key: string;
  readonly signals: readonly Signal[];
}

export interface PatternStats {
  wins: number;
  losses: number;
  consecutiveLosses: number;
  lastResult: OutcomeResult;
  recentOutcomes: number[];
  firstSeenAt: number;
  updatedAt: number;
}

export interface PatternRecord {
  pattern: Pattern;
  stats: PatternStats;
}

export interface PatternReportEntry {
  key: string;
  signals: readonly Signal[];
  wins: number;
  losses: number;
  total: number;
  winRate: number | null;
  consecutiveLosses: number;
  lastResult: OutcomeResult;
  avgRecentOutcome: number | null;
  updatedAt: number;
}

export interface SignalStats {
  signal: Signal;
  wins: number;
  total: number;
  weight: number;
}

export interface StopLevels {
  stopLoss: number;
  emergencyStop: number;
  takeProfit: number;
  trailingStep: number;
}

export interface Position {
  id: string;
  symbol: string;
  side: Side;
  entryPrice: number;
  quantity: number;
  entryTime: number;
  stopLoss: number;
  initialStopLoss: number;
  emergencyStop: number;
  takeProfit: number;
  trailingStep?: number;
  lastPrice: number;
  bestPrice: number;
  unrealizedPnl: number;
  pattern: Pattern;
  status: PositionStatus;
}

export interface TradeRecord {
  positionId: string;
  symbol: string;
  side: Side;
  entryPrice: number;
  exitPrice: number;
  quantity: number;
  entryTime: number;
  exitTime: number;
  durationMs: number;
  exitReason: ExitReason;
  realizedPnl: number;
  returnPct: number;
  pattern: Pattern;
}

export interface PriceTick {
  symbol: string;
  price: number;
  /** Highest price traded since the previous tick, when known. */
  high?: number;
  /** Lowest price traded since the previous tick, when known. */
  low?: number;
  ts?: number;
}

export interface PortfolioSummary {
  openCount: number;
  totalExposure: number;
  totalUnrealizedPnl: number;
  totalRealizedPnl: number;
}

export interface TradeStatistics {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  avgPnl: number;
  maxPnl: number;
  minPnl: number;
  pnlStd: number;
  avgDurationMs: number;
  /** Largest peak-to-trough fall of cumulative realized PnL, in quote currency. */
  maxDrawdown: number;
}

export interface RiskMetrics {
  tradingDay: string;
  currentExposure: number;
  dailyDrawdown: number;
  riskScore: number;
  winRate: number;
  profitFactor: number;
  avgWinLossRatio: number;
  realizedPnlToday: number;
  unrealizedPnl: number;
  updatedAt: number;
}

export type RiskVeto =
  | "invalid_input"
  | "order_interval"
  | "exposure"
  | "daily_drawdown"
  | "risk_score";

export type GateReason =
  | "pattern_approved"
  | "unseen_pattern"
  | "exploring"
  | "insufficient_signals"
  | "unseen_pattern_denied"
  | "low_win_rate"
  | "consecutive_losses"
  | "low_trade_score";

export type DecisionReason =
  | GateReason
  | "invalid_input"
  | "insufficient_size"
  | "invalid_stops"
  | "risk_limit_exceeded";

export interface MarketContext {
  side: Side;
  price: number;
  atr: number;
  volatility: number;
  /** Conviction of the signal set in [-1, 1]. */
  signalStrength: number;
}

export interface TradeDecision {
  approved: boolean;
  reason: DecisionReason;
  symbol: string;
  side: Side;
  pattern: Pattern;
  /** Mean learned weight of the pattern's signals, in [0, 2]; 1 is neutral. */
  tradeScore: number;
  /** 0.5 scaled by the weight of each signal with history, capped at 1. */
  probability: number;
  /** Position size in quote currency. */
  sizeHint?: number;
  quantity?: number;
  stops?: StopLevels;
  riskVeto?: RiskVeto;
}
