import logger from "../config/logger";
import { incCounter } from "../obs/metrics";
import { MAX_SIZE } from "./boundedBody";
import { fetchText } from "./fetchText";
import type { HttpClient } from "./httpClient";
import { parseDocument, type ParsedDocument } from "./metadata";
import { errorText } from "./previewErrors";
import { failure, success, type Outcome, type PreviewCache } from "./previewCache";

export type LinkPreviewDeps = {
  client: HttpClient;
  cache: PreviewCache<Outcome>;
  /** Defaults to the cheerio-backed parser. */
  parse?: (text: string) => ParsedDocument;
  maxBytes?: number;
  /**
   * Concurrent misses on one URL share a single computation instead of each
   * fetching and storing independently (last write wins).
   */
  singleFlight?: boolean;
};

export type LinkPreviewService = {
  getPreview(url: string): Promise<Outcome>;
};

export function createLinkPreviewService(deps: LinkPreviewDeps): LinkPreviewService {
  const { client, cache } = deps;
  const parse = deps.parse ?? parseDocument;
  const maxBytes = deps.maxBytes ?? MAX_SIZE;
  const inflight = new Map<string, Promise<Outcome>>();

  async function compute(url: string): Promise<Outcome> {
    try {
      const text = await fetchText(client, url, maxBytes);
      return success(parse(text).metadata());
    } catch (err) {
      return failure(errorText(err));
    }
  }

  async function computeAndStore(url: string): Promise<Outcome> {
    const outcome = await compute(url);
    // Failures are stored too; they replay until the entry expires.
    cache.insert(url, outcome);

    if (outcome.ok) {
      incCounter("link_preview_success");
    } else {
      incCounter("link_preview_fail");
      logger.warn({ url, error: outcome.error }, "Link preview failed");
    }
    return outcome;
  }

  async function getPreview(url: string): Promise<Outcome> {
    const cached = cache.get(url);
    if (cached) {
      incCounter("link_preview_cache_hit");
      return cached.value;
    }
    incCounter("link_preview_cache_miss");
    logger.debug({ url }, "Link preview cache miss");

    if (!deps.singleFlight) return computeAndStore(url);

    const pending = inflight.get(url);
    if (pending) return pending;

    const promise = computeAndStore(url).finally(() => {
      inflight.delete(url);
    });
    inflight.set(url, promise);
    return promise;
  }

  return { getPreview };
}
