import * as cheerio from "cheerio";
import type { LinkCandidate } from "../documents/types.js";

const SKIPPED_HREF = /^(mailto:|javascript:|tel:|#)/i;

export function resolveUrl(base: string, href: string): string | undefined {
  try {
    return new URL(href, base).href;
  } catch {
    return undefined;
  }
}

/** Every followable anchor on the page, with hrefs resolved against `pageUrl`. */
export function collectLinks(html: string, pageUrl: string): LinkCandidate[] {
  const $ = cheerio.load(html);
  const links: LinkCandidate[] = [];

  $("a[href]").each((_, el) => {
    const href = ($(el).attr("href") ?? "").trim();
    if (!href || SKIPPED_HREF.test(href)) return;

    const resolvedUrl = resolveUrl(pageUrl, href);
    if (!resolvedUrl) return;

    links.push({
      href,
      anchorText: $(el).text().replace(/\s+/g, " ").trim(),
      resolvedUrl,
    });
  });

  return links;
}
