import { MAX_SIZE, iterateBody, readBounded } from "./boundedBody";
import type { HttpClient } from "./httpClient";
import { FetchError } from "./previewErrors";

function describeFailure(err: unknown, timedOut: boolean): string {
  if (timedOut) return "operation timed out";
  if (!(err instanceof Error)) return String(err);
  // undici wraps socket errors: "fetch failed" with the real reason in `cause`
  const cause = err.cause;
  if (cause instanceof Error && cause.message && cause.message !== err.message) {
    return `${err.message}: ${cause.message}`;
  }
  return err.message;
}

/**
 * GETs `url` and returns at most `maxBytes` of its body as text. The client's
 * timeout covers the whole exchange; every failure becomes a FetchError.
 */
export async function fetchText(
  client: HttpClient,
  url: string,
  maxBytes: number = MAX_SIZE
): Promise<string> {
  const ac = new AbortController();
  let timedOut = false;
  const t = setTimeout(() => {
    timedOut = true;
    ac.abort();
  }, client.timeoutMs);

  try {
    const res = await client.get(url, ac.signal);
    return await readBounded(iterateBody(res.body), maxBytes);
  } catch (err) {
    if (err instanceof FetchError) throw err;
    throw new FetchError(`error sending request for url (${url}): ${describeFailure(err, timedOut)}`, {
      cause: err,
    });
  } finally {
    clearTimeout(t);
  }
}
