import pino from "pino";
import type { NextFunction, Request, Response } from "express";
import { validateEnv } from "@shared/env";

const env = validateEnv(process.env);

// Create base logger with LOG_LEVEL from env
export const logger = pino({
  level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
  ...(env.NODE_ENV === "development"
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

// HTTP request logger middleware
export function createHttpLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      const duration = Date.now() - start;
      const log = {
        method: req.method,
        url: req.url,
        status: res.statusCode,
        duration,
        userAgent: req.headers["user-agent"],
      };

      if (res.statusCode >= 500) {
        logger.error(log, "HTTP request error");
      } else if (res.statusCode >= 400) {
        logger.warn(log, "HTTP request warning");
      } else {
        logger.debug(log, "HTTP request");
      }
    });
    next();
  };
}
