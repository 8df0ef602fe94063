import { closePositionSchema, evaluateTradeSchema, priceTickSchema } from "@shared/schemas";
import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";

import type { TradingEngine } from "../engine/tradingEngine";

function invalidInput(res: Response, error: z.ZodError) {
  res.status(400).json({
    ok: false,
    error: {
      code: "INVALID_INPUT",
      message: error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "),
      issues: error.issues,
    },
  });
}

const symbolParamSchema = z
  .string()
  .trim()
  .min(1)
  .transform((s) => s.toUpperCase());

export function createEngineRouter(engine: TradingEngine): Router {
  const router: Router = Router();

  router.post("/evaluate", (req: Request, res: Response) => {
    const parsed = evaluateTradeSchema.safeParse(req.body);
    if (!parsed.success) return invalidInput(res, parsed.error);

    const { symbol, signals, capital, context } = parsed.data;
    res.json({ ok: true, decision: engine.evaluateTrade(symbol, signals, capital, context) });
  });

  router.post("/trades", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = evaluateTradeSchema.safeParse(req.body);
    if (!parsed.success) return invalidInput(res, parsed.error);

    try {
      const result = await engine.submitTrade(parsed.data);
      res.status(result.executed ? 201 : 200).json({ ok: true, ...result });
    } catch (error) {
      next(error);
    }
  });

  router.post("/ticks", (req: Request, res: Response) => {
    const parsed = priceTickSchema.safeParse(req.body);
    if (!parsed.success) return invalidInput(res, parsed.error);

    const closed = engine.onPriceTick(parsed.data);
    res.json({ ok: true, closed });
  });

  router.post("/positions/:symbol/close", (req: Request, res: Response) => {
    const symbol = symbolParamSchema.safeParse(req.params.symbol);
    if (!symbol.success) return invalidInput(res, symbol.error);
    const parsed = closePositionSchema.safeParse(req.body);
    if (!parsed.success) return invalidInput(res, parsed.error);

    const trade = engine.close(symbol.data, parsed.data.price);
    if (!trade) {
      return res.status(404).json({
        ok: false,
        error: { code: "NOT_FOUND", message: `No open position for ${symbol.data}` },
      });
    }
    res.json({ ok: true, trade });
  });

  router.get("/portfolio", (_req: Request, res: Response) => {
    res.json({ ok: true, summary: engine.portfolioSummary() });
  });

  router.get("/positions", (req: Request, res: Response) => {
    const symbol = typeof req.query.symbol === "string" ? req.query.symbol.toUpperCase() : undefined;
    res.json({ ok: true, positions: engine.positions(symbol) });
  });

  router.get("/patterns", (_req: Request, res: Response) => {
    res.json({ ok: true, patterns: engine.patternReport() });
  });

  router.get("/signals", (_req: Request, res: Response) => {
    res.json({ ok: true, signals: engine.signalReport() });
  });

  router.get("/risk", (_req: Request, res: Response) => {
    res.json({
      ok: true,
      metrics: engine.riskMetrics(),
      reduceExposure: engine.shouldReduceExposure(),
    });
  });

  router.get("/stats", (_req: Request, res: Response) => {
    res.json({ ok: true, stats: engine.tradeStatistics() });
  });

  return router;
}
