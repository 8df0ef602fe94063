import type { Request, Response, NextFunction } from "express";

import { EngineError, toLogError } from "../errors";
import { logger } from "../logger";

const log = logger.child({ component: "http" });

function isBodyParseError(err: unknown): err is SyntaxError & { status: number } {
  return err instanceof SyntaxError && "status" in err && err.status === 400;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  let status = 500;
  let code = "INTERNAL_ERROR";
  let message = "Unexpected server error";

  if (err instanceof EngineError) {
    status = err.status;
    code = err.code;
    message = err.message;
  } else if (isBodyParseError(err)) {
    status = 400;
    code = "INVALID_INPUT";
    message = "Malformed JSON body";
  }

  const details = { status, code, path: req.path, method: req.method, err: toLogError(err) };
  if (status >= 500) {
    log.error(details, "API error");
  } else {
    log.warn(details, "API error");
  }

  res.status(status).json({
    ok: false,
    error: {
      code,
      message,
    },
  });
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({
    ok: false,
    error: {
      code: "NOT_FOUND",
      message: `Route not found: ${req.method} ${req.path}`,
    },
  });
}
