import { Router, type NextFunction, type Request, type Response } from "express";
import env from "../config/env";
import type { LinkPreviewService } from "../lib/linkPreview";
import { getMetricsSnapshot } from "../obs/metrics";
import { createLinkPreviewRouter } from "./linkPreview";

function requireMetricsToken(req: Request, res: Response, next: NextFunction) {
  const auth = req.get("authorization") || "";
  const token = auth.startsWith("Bearer ") ? auth.slice(7).trim() : "";
  if (!env.METRICS_TOKEN || token !== env.METRICS_TOKEN) {
    res.status(401).json({ message: "Unauthorized" });
    return;
  }
  next();
}

export function createRoutes(service: LinkPreviewService): Router {
  const router = Router();

  router.use(createLinkPreviewRouter(service));

  router.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  router.get("/metrics", requireMetricsToken, (_req, res) => {
    res.json(getMetricsSnapshot());
  });

  return router;
}
