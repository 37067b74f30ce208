import type { Request, Response, NextFunction } from "express";
import logger from "../config/logger";

export function httpLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = process.hrtime.bigint();
  res.on("finish", () => {
    const end = process.hrtime.bigint();
    const durationMs = Number(end - start) / 1_000_000;
    logger.info(
      {
        request_id: req.requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        duration_ms: Math.round(durationMs * 100) / 100,
      },
      "http_request"
    );
  });
  next();
}
