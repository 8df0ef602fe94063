import type { Request, Response } from "express";

let serverReady = true;

export function setServerReady(ready: boolean) {
  serverReady = ready;
}

export function liveness(_req: Request, res: Response) {
  res.status(200).json({ ok: true, status: "live" });
}

export function readiness(_req: Request, res: Response) {
  const status = serverReady ? 200 : 503;
  res.status(status).json({
    ok: serverReady,
    status: serverReady ? "ready" : "starting",
  });
}
