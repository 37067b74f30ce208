import { FetchError } from "./previewErrors";

/** Hard cap on the body bytes handed to the parser (1 MiB). */
export const MAX_SIZE = 1024 * 1024;

type ChunkReader = {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
  releaseLock(): void;
};

type ChunkStream = { getReader(): ChunkReader };

/**
 * Lazily yields the body's chunks. Stopping early (break/return from a
 * for-await) cancels the stream so the rest of the body is never read.
 */
export async function* iterateBody(body: ChunkStream | null): AsyncGenerator<Uint8Array> {
  if (!body) return;
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      if (value && value.byteLength) yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

function sequenceLength(lead: number): number {
  if (lead >= 0xf8) return 1;
  if (lead >= 0xf0) return 4;
  if (lead >= 0xe0) return 3;
  if (lead >= 0xc0) return 2;
  return 1;
}

/**
 * Length of the longest prefix of `bytes` that does not end inside a UTF-8
 * character: an incomplete trailing sequence is dropped. Malformed bytes
 * elsewhere are left for the decoder to reject.
 */
export function utf8SafeLength(bytes: Uint8Array): number {
  const len = bytes.byteLength;
  for (let back = 1; back <= Math.min(4, len); back++) {
    const byte = bytes[len - back];
    if (byte === undefined || isContinuationByte(byte)) continue;
    return back < sequenceLength(byte) ? len - back : len;
  }
  return len;
}

/**
 * Length of the longest prefix of `bytes` that is well-formed UTF-8. Stops at
 * the first invalid or incomplete sequence (overlongs and surrogates included).
 */
export function utf8ValidPrefixLength(bytes: Uint8Array): number {
  const len = bytes.byteLength;
  let i = 0;
  while (i < len) {
    const lead = bytes[i] ?? 0;
    if (lead < 0x80) {
      i++;
      continue;
    }

    let need: number;
    let lo = 0x80;
    let hi = 0xbf;
    if (lead >= 0xc2 && lead <= 0xdf) {
      need = 1;
    } else if (lead >= 0xe0 && lead <= 0xef) {
      need = 2;
      if (lead === 0xe0) lo = 0xa0;
      else if (lead === 0xed) hi = 0x9f;
    } else if (lead >= 0xf0 && lead <= 0xf4) {
      need = 3;
      if (lead === 0xf0) lo = 0x90;
      else if (lead === 0xf4) hi = 0x8f;
    } else {
      return i;
    }

    for (let k = 1; k <= need; k++) {
      const byte = bytes[i + k];
      if (byte === undefined) return i;
      if (byte < (k === 1 ? lo : 0x80) || byte > (k === 1 ? hi : 0xbf)) return i;
    }
    i += need + 1;
  }
  return len;
}

function concat(chunks: Uint8Array[], total: number): Uint8Array {
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (err) {
    throw new FetchError("response body is not valid UTF-8", { cause: err });
  }
}

/**
 * Accumulates chunks up to `maxBytes` and decodes them as UTF-8. On overflow
 * the bytes that fit are cut back to their longest valid prefix and reading
 * stops. Invalid bytes in a chunk that fit whole still reject.
 * The result never exceeds `maxBytes` encoded bytes; truncation is silent.
 */
export async function readBounded(
  chunks: AsyncIterable<Uint8Array>,
  maxBytes: number = MAX_SIZE
): Promise<string> {
  const kept: Uint8Array[] = [];
  let total = 0;

  for await (const chunk of chunks) {
    if (total + chunk.byteLength <= maxBytes) {
      kept.push(chunk);
      total += chunk.byteLength;
      continue;
    }

    // Whole chunks decode strictly. The slice of the cut chunk, plus any
    // character left open at the end of the whole chunks, keeps only its
    // longest valid prefix.
    const whole = concat(kept, total);
    const head = utf8SafeLength(whole);
    const cut = chunk.subarray(0, maxBytes - total);
    const tail = concat([whole.subarray(head), cut], total - head + cut.byteLength);
    return decodeUtf8(whole.subarray(0, head)) + decodeUtf8(tail.subarray(0, utf8ValidPrefixLength(tail)));
  }

  return decodeUtf8(concat(kept, total));
}
