import http from "http";
import { createApp } from "./app";
import env from "./config/env";
import logger from "./config/logger";
import { createHttpClient } from "./lib/httpClient";
import { createLinkPreviewService } from "./lib/linkPreview";
import { TtlCache } from "./lib/previewCache";
import { setGauge } from "./obs/metrics";

// One client and one cache for the process lifetime, shared by every request
const client = createHttpClient({ blockPrivateNetworks: env.BLOCK_PRIVATE_NETWORKS });
const cache = new TtlCache();
const service = createLinkPreviewService({
  client,
  cache,
  singleFlight: env.PREVIEW_SINGLE_FLIGHT,
});

const sweep = setInterval(() => {
  const removed = cache.purgeExpired();
  setGauge("link_preview_cache_entries", cache.size);
  if (removed) logger.debug({ removed, size: cache.size }, "Purged expired link previews");
}, env.CACHE_SWEEP_INTERVAL_MS);
sweep.unref();

const httpServer = http.createServer(createApp(service));

httpServer.listen(env.PORT, env.HOST, () => {
  logger.info(`Server running at http://${env.HOST}:${env.PORT}`);
});

const shutdown = (signal: string) => {
  logger.info({ signal }, "Shutting down gracefully");
  clearInterval(sweep);
  httpServer.close(() => {
    client
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, "Failed to close HTTP client");
        process.exit(1);
      });
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
