import * as cheerio from "cheerio";
import { ParseError } from "./previewErrors";

export type Metatag = {
  name: string;
  content: string;
};

export type MetaData = Readonly<{
  title: string | null;
  description: string | null;
  canonical: string | null;
  language: string | null;
  rss: string | null;
  image: string | null;
  amp: string | null;
  author: string | null;
  date: string | null;
  /**
   * Every `<meta>` carrying a name and content, in document order.
   * Repeated names are kept. `null` when the page has none.
   */
  metatags: ReadonlyArray<Readonly<Metatag>> | null;
}>;

export type ParsedDocument = {
  metadata(): MetaData;
};

function cleanText(v: string | null | undefined): string | null {
  if (!v) return null;
  const s = v.replace(/\s+/g, " ").trim();
  return s || null;
}

function cleanAttr(v: string | undefined): string | null {
  if (v === undefined) return null;
  const s = v.trim();
  return s || null;
}

function readMetatags($: cheerio.CheerioAPI): Metatag[] {
  const tags: Metatag[] = [];
  for (const el of $("meta").toArray()) {
    const node = $(el);
    const name = cleanAttr(node.attr("name") ?? node.attr("property") ?? node.attr("itemprop"));
    const content = node.attr("content");
    if (!name || content === undefined) continue;
    tags.push(Object.freeze({ name, content: content.trim() }));
  }
  return tags;
}

function buildMetadata($: cheerio.CheerioAPI): MetaData {
  const meta = (selector: string) => cleanAttr($(selector).first().attr("content"));
  const href = (selector: string) => cleanAttr($(selector).first().attr("href"));

  const metatags = readMetatags($);

  return Object.freeze({
    title: cleanText($("title").first().text()),
    description: meta('meta[name="description" i]'),
    canonical: href('link[rel~="canonical" i]'),
    language: cleanAttr($("html").first().attr("lang")),
    rss: href('link[type="application/rss+xml" i]'),
    image: meta('meta[property="og:image"]') ?? meta('meta[name="twitter:image"]'),
    amp: href('link[rel~="amphtml" i]'),
    author: meta('meta[name="author" i]'),
    date: meta('meta[property="article:published_time"]') ?? meta('meta[name="date" i]'),
    metatags: metatags.length ? Object.freeze(metatags) : null,
  });
}

export function parseDocument(text: string): ParsedDocument {
  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(text);
  } catch (err) {
    throw new ParseError(`failed to parse document: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  let built: MetaData | null = null;
  return {
    metadata() {
      if (!built) built = buildMetadata($);
      return built;
    },
  };
}
