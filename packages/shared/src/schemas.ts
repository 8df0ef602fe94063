import { z } from 'zod';

export const sideSchema = z.enum(['long', 'short']);

export const signalsSchema = z.array(z.string().trim().min(1)).max(64);

export const marketContextSchema = z.object({
  side: sideSchema,
  price: z.number().positive(),
  atr: z.number().nonnegative(),
  volatility: z.number().nonnegative(),
  signalStrength: z.number().min(-1).max(1),
});

export const evaluateTradeSchema = z.object({
  symbol: z.string().trim().min(1).transform((s) => s.toUpperCase()),
  signals: signalsSchema,
  capital: z.number().positive(),
  context: marketContextSchema,
});

export const priceTickSchema = z
  .object({
    symbol: z.string().trim().min(1).transform((s) => s.toUpperCase()),
    price: z.number().positive(),
    high: z.number().positive().optional(),
    low: z.number().positive().optional(),
    ts: z.number().int().nonnegative().optional(),
  })
  .refine((t) => t.high === undefined || t.high >= t.price, {
    message: 'high must be >= price',
    path: ['high'],
  })
  .refine((t) => t.low === undefined || t.low <= t.price, {
    message: 'low must be <= price',
    path: ['low'],
  });

export const closePositionSchema = z.object({
  price: z.number().positive(),
});
