import { load } from "cheerio";

/**
 * Collects the `src` of every `<img>` on a page, in document order.
 * Images without a `src` are skipped; malformed markup is parsed best-effort.
 */
export function extractImageSources(html: string): string[] {
  const $ = load(html);
  const sources: string[] = [];

  $("img").each((_, el) => {
    const src = $(el).attr("src");
    if (src !== undefined) sources.push(src);
  });

  return sources;
}
