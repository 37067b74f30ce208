import express from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import type { LinkPreviewService } from "./lib/linkPreview";
import { createRoutes } from "./routes";
import { requestIdMiddleware } from "./middlewares/requestId";
import { httpLoggerMiddleware } from "./middlewares/httpLogger";

export function createApp(service: LinkPreviewService) {
  const app = express();

  // Respect reverse proxy headers (X-Forwarded-*)
  app.set("trust proxy", true);
  app.set("etag", false);

  // request_id baseline: attach id early, always return it in headers
  app.use(requestIdMiddleware);
  // structured baseline logs
  app.use(httpLoggerMiddleware);

  app.use(
    helmet({
      // Previews are fetched from other origins' pages
      crossOriginResourcePolicy: { policy: "cross-origin" },
    })
  );
  // Any origin may ask for a preview
  app.use(cors());
  app.use(compression());

  app.use(createRoutes(service));

  return app;
}
