import { Agent, fetch, type Dispatcher } from "undici";
import { assertSafeUrl } from "../security/ssrf";

export const REQUEST_TIMEOUT_MS = 10_000;
export const KEEP_ALIVE_TIMEOUT_MS = 90_000;
export const MAX_REDIRECTS = 10;

// Some sites block non-browser UAs; use a common desktop UA.
export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/137.0.0.0 Safari/537.36";

export type HttpBody = {
  getReader(): {
    read(): Promise<{ done: boolean; value?: Uint8Array }>;
    cancel(reason?: unknown): Promise<void>;
    releaseLock(): void;
  };
};

export type HttpResponse = {
  finalUrl: string;
  status: number;
  body: HttpBody | null;
};

export interface HttpClient {
  /** Budget for the whole exchange, body included. */
  readonly timeoutMs: number;
  get(url: string, signal: AbortSignal): Promise<HttpResponse>;
  close(): Promise<void>;
}

export type HttpClientOptions = {
  timeoutMs?: number;
  maxRedirects?: number;
  userAgent?: string;
  blockPrivateNetworks?: boolean;
  // Tests pass an undici MockAgent here
  dispatcher?: Dispatcher;
};

export function createHttpClient(opts: HttpClientOptions = {}): HttpClient {
  const timeoutMs = opts.timeoutMs ?? REQUEST_TIMEOUT_MS;
  const maxRedirects = opts.maxRedirects ?? MAX_REDIRECTS;
  const userAgent = opts.userAgent ?? BROWSER_USER_AGENT;
  const blockPrivateNetworks = opts.blockPrivateNetworks ?? false;
  const dispatcher =
    opts.dispatcher ??
    // Concurrent sockets per origin are not capped; only idle keep-alive is tuned
    new Agent({ keepAliveTimeout: KEEP_ALIVE_TIMEOUT_MS });

  async function get(urlString: string, signal: AbortSignal): Promise<HttpResponse> {
    let current = new URL(urlString);

    // Manual redirects so each hop can be validated
    for (let i = 0; i <= maxRedirects; i++) {
      if (blockPrivateNetworks) await assertSafeUrl(current);

      const res = await fetch(current.toString(), {
        method: "GET",
        redirect: "manual",
        signal,
        dispatcher,
        headers: {
          "user-agent": userAgent,
          accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        },
      });

      if (res.status >= 300 && res.status < 400) {
        const loc = res.headers.get("location");
        if (loc) {
          await res.body?.cancel().catch(() => undefined);
          current = new URL(loc, current);
          continue;
        }
      }

      return { finalUrl: current.toString(), status: res.status, body: res.body };
    }

    throw new Error(`too many redirects (max ${maxRedirects})`);
  }

  return {
    timeoutMs,
    get,
    close: () => dispatcher.close(),
  };
}
