import assert from "node:assert/strict";
import { iterateBody, readBounded, utf8SafeLength, utf8ValidPrefixLength } from "../src/lib/boundedBody";
import { FetchError } from "../src/lib/previewErrors";

const enc = new TextEncoder();

async function* chunksOf(...parts: Array<string | number[]>): AsyncGenerator<Uint8Array> {
  for (const p of parts) {
    yield typeof p === "string" ? enc.encode(p) : Uint8Array.from(p);
  }
}

function testUtf8SafeLength() {
  assert.equal(utf8SafeLength(enc.encode("abc")), 3);
  assert.equal(utf8SafeLength(enc.encode("ab€")), 5);
  // "ab" + first two bytes of "€"
  assert.equal(utf8SafeLength(Uint8Array.from([0x61, 0x62, 0xe2, 0x82])), 2);
  // dangling lead byte of a 4-byte character
  assert.equal(utf8SafeLength(Uint8Array.from([0x61, 0xf0])), 1);
  assert.equal(utf8SafeLength(new Uint8Array(0)), 0);
}

function testUtf8ValidPrefixLength() {
  assert.equal(utf8ValidPrefixLength(enc.encode("ab€😀")), 9);
  assert.equal(utf8ValidPrefixLength(Uint8Array.from([0x61, 0xff, 0x62])), 1);
  // incomplete "€" at the end
  assert.equal(utf8ValidPrefixLength(Uint8Array.from([0x61, 0xe2, 0x82])), 1);
  // stray continuation byte
  assert.equal(utf8ValidPrefixLength(Uint8Array.from([0x61, 0x62, 0x80, 0x63])), 2);
  // overlong "/", UTF-16 surrogate, above U+10FFFF
  assert.equal(utf8ValidPrefixLength(Uint8Array.from([0xc0, 0xaf])), 0);
  assert.equal(utf8ValidPrefixLength(Uint8Array.from([0xed, 0xa0, 0x80])), 0);
  assert.equal(utf8ValidPrefixLength(Uint8Array.from([0xf4, 0x90, 0x80, 0x80])), 0);
  assert.equal(utf8ValidPrefixLength(new Uint8Array(0)), 0);
}

async function testUnderCapIsUnchanged() {
  const html = "<html><title>Héllo wörld</title></html>";
  assert.equal(await readBounded(chunksOf("<html><title>Hé", "llo wörld</title></html>"), 1024), html);
}

async function testExactlyAtCapIsUnchanged() {
  const text = "añb"; // 4 bytes
  assert.equal(await readBounded(chunksOf("añ", "b"), 4), text);
}

async function testOverflowAscii() {
  assert.equal(await readBounded(chunksOf("abcdef", "ghijkl"), 10), "abcdefghij");
}

async function testOverflowInsideMultibyteCharacter() {
  // "abcdé" is 6 bytes; a 5-byte cap would split "é"
  assert.equal(await readBounded(chunksOf("abcdé"), 5), "abcd");
}

async function testCharacterSplitAcrossChunks() {
  // "€" is E2 82 AC and straddles the two chunks
  const first = [0x61, 0x62, 0xe2];
  const second = [0x82, 0xac, 0x63, 0x64];
  assert.equal(await readBounded(chunksOf(first, second), 4), "ab");
  assert.equal(await readBounded(chunksOf(first, second), 5), "ab€");
  assert.equal(await readBounded(chunksOf(first, second), 100), "ab€cd");
}

async function testStopsPullingOnceBudgetIsSpent() {
  let pulled = 0;
  let closed = false;
  async function* source(): AsyncGenerator<Uint8Array> {
    try {
      for (const s of ["abc", "def", "ghi"]) {
        pulled++;
        yield enc.encode(s);
      }
    } finally {
      closed = true;
    }
  }
  assert.equal(await readBounded(source(), 3), "abc");
  assert.equal(pulled, 2);
  assert.equal(closed, true);
}

async function testCapFallingBetweenChunksInsideCharacter() {
  // 1001-byte cap over 7-byte chunks of 4-byte emoji: 143 chunks fill the
  // budget exactly and leave a lone lead byte at the end.
  const all = enc.encode("😀".repeat(1000));
  async function* sevens(): AsyncGenerator<Uint8Array> {
    for (let i = 0; i < all.byteLength; i += 7) yield all.subarray(i, i + 7);
  }
  const out = await readBounded(sevens(), 1001);
  assert.equal(out, "😀".repeat(250));
  assert.equal(Buffer.byteLength(out, "utf8"), 1000);
}

async function testInvalidUtf8Rejects() {
  await assert.rejects(
    () => readBounded(chunksOf([0xff, 0x61]), 1024),
    (err: unknown) => err instanceof FetchError && /not valid UTF-8/.test(err.message)
  );
}

async function testInvalidByteInCutChunkIsDropped() {
  // 6-byte cap: the cut chunk contributes "d", 0xFF, "e"; only "d" is valid
  assert.equal(await readBounded(chunksOf("abc", [0x64, 0xff, 0x65, 0x66, 0x67]), 6), "abcd");
  // invalid byte right at the start of the cut chunk
  assert.equal(await readBounded(chunksOf("abc", [0xff, 0x64, 0x65]), 5), "abc");
}

async function testInvalidByteInWholeChunkStillRejects() {
  await assert.rejects(
    () => readBounded(chunksOf([0x61, 0xff], "bcdef"), 4),
    (err: unknown) => err instanceof FetchError && err.message === "response body is not valid UTF-8"
  );
}

async function testByteOrderMarkIsKept() {
  assert.equal(await readBounded(chunksOf([0xef, 0xbb, 0xbf, 0x61]), 1024), "\ufeffa");
}

async function testIterateBodyCancelsOnEarlyExit() {
  let cancelled = false;
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      controller.enqueue(enc.encode("0123456789"));
    },
    cancel() {
      cancelled = true;
    },
  });
  assert.equal(await readBounded(iterateBody(stream), 25), "0123456789012345678901234");
  assert.equal(cancelled, true);
}

async function testIterateBodyNullBody() {
  assert.equal(await readBounded(iterateBody(null), 10), "");
}

async function main() {
  testUtf8SafeLength();
  testUtf8ValidPrefixLength();
  await testUnderCapIsUnchanged();
  await testExactlyAtCapIsUnchanged();
  await testOverflowAscii();
  await testOverflowInsideMultibyteCharacter();
  await testCharacterSplitAcrossChunks();
  await testStopsPullingOnceBudgetIsSpent();
  await testCapFallingBetweenChunksInsideCharacter();
  await testInvalidUtf8Rejects();
  await testInvalidByteInCutChunkIsDropped();
  await testInvalidByteInWholeChunkStillRejects();
  await testByteOrderMarkIsKept();
  await testIterateBodyCancelsOnEarlyExit();
  await testIterateBodyNullBody();
}

void main().then(
  () => {
    // eslint-disable-next-line no-console
    console.log("bounded-body: ok");
  },
  (err) => {
    // eslint-disable-next-line no-console
    console.error("bounded-body: failed", err);
    process.exit(1);
  }
);
