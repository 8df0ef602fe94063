import {
  pgTable,
  text,
  integer,
  bigint,
  doublePrecision,
  jsonb,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

export const patternStats = pgTable('pattern_stats', {
  key: text('key').primaryKey(),
  signals: jsonb('signals').$type<string[]>().notNull(),
  wins: integer('wins').notNull().default(0),
  losses: integer('losses').notNull().default(0),
  consecutiveLosses: integer('consecutive_losses').notNull().default(0),
  lastResult: text('last_result', { enum: ['win', 'loss', 'unknown'] }).notNull().default('unknown'),
  recentOutcomes: jsonb('recent_outcomes').$type<number[]>().notNull(),
  firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
});

export const positions = pgTable(
  'positions',
  {
    id: text('id').primaryKey(),
    symbol: text('symbol').notNull(),
    side: text('side', { enum: ['long', 'short'] }).notNull(),
    entryPrice: doublePrecision('entry_price').notNull(),
    quantity: doublePrecision('quantity').notNull(),
    entryTime: timestamp('entry_time', { withTimezone: true }).notNull(),
    stopLoss: doublePrecision('stop_loss').notNull(),
    initialStopLoss: doublePrecision('initial_stop_loss').notNull(),
    emergencyStop: doublePrecision('emergency_stop').notNull(),
    takeProfit: doublePrecision('take_profit').notNull(),
    trailingStep: doublePrecision('trailing_step'),
    lastPrice: doublePrecision('last_price').notNull(),
    bestPrice: doublePrecision('best_price').notNull(),
    unrealizedPnl: doublePrecision('unrealized_pnl').notNull().default(0),
    patternSignals: jsonb('pattern_signals').$type<string[]>().notNull(),
    status: text('status', { enum: ['open', 'closed'] }).notNull().default('open'),
  },
  (table) => ({
    statusIdx: index('positions_status_idx').on(table.status),
  })
);

export const trades = pgTable(
  'trades',
  {
    positionId: text('position_id').primaryKey(),
    symbol: text('symbol').notNull(),
    side: text('side', { enum: ['long', 'short'] }).notNull(),
    entryPrice: doublePrecision('entry_price').notNull(),
    exitPrice: doublePrecision('exit_price').notNull(),
    quantity: doublePrecision('quantity').notNull(),
    entryTime: timestamp('entry_time', { withTimezone: true }).notNull(),
    exitTime: timestamp('exit_time', { withTimezone: true }).notNull(),
    durationMs: bigint('duration_ms', { mode: 'number' }).notNull(),
    exitReason: text('exit_reason', {
      enum: ['emergency_stop', 'stop_loss', 'trailing_stop', 'take_profit', 'manual'],
    }).notNull(),
    realizedPnl: doublePrecision('realized_pnl').notNull(),
    returnPct: doublePrecision('return_pct').notNull(),
    patternSignals: jsonb('pattern_signals').$type<string[]>().notNull(),
  },
  (table) => ({
    exitTimeIdx: index('trades_exit_time_idx').on(table.exitTime),
  })
);
