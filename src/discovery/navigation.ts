import type { LinkCandidate } from "../documents/types.js";
import type { Logger } from "../logger.js";
import { scoreNavigationLink } from "../scoring/link-scorer.js";

interface NavigationCandidate {
  url: string;
  text: string;
  priority: number;
  textMatchBonus: number;
}

function isDocumentUrl(url: string, excludedExtensions: string[]): boolean {
  const lower = url.toLowerCase();
  return excludedExtensions.some((ext) => lower.endsWith(ext));
}

/**
 * Picks the link most likely to lead to a page of the requested kind.
 * Ranking: keyword priority, then anchor-text match, then shorter anchor text.
 */
export function resolveNavigationPage(
  pageUrl: string,
  links: LinkCandidate[],
  keywords: string[],
  pageTypeName: string,
  excludedExtensions: string[],
  logger: Logger
): string | undefined {
  logger.info(`Searching for '${pageTypeName}' page link on ${pageUrl}`);
  const candidates: NavigationCandidate[] = [];

  for (const link of links) {
    if (isDocumentUrl(link.resolvedUrl, excludedExtensions)) continue;

    const scored = scoreNavigationLink(link, pageUrl, keywords);
    if (!scored || scored.priorityRank === undefined) continue;

    candidates.push({
      url: scored.url,
      text: link.anchorText,
      priority: scored.priorityRank,
      textMatchBonus: scored.score,
    });
  }

  if (candidates.length === 0) {
    logger.warning(`No '${pageTypeName}' link found on ${pageUrl}`);
    return undefined;
  }

  candidates.sort(
    (a, b) =>
      a.priority - b.priority ||
      b.textMatchBonus - a.textMatchBonus ||
      a.text.length - b.text.length
  );

  const best = candidates[0];
  logger.info(`Found '${pageTypeName}' page: ${best.url} (text: '${best.text}')`);
  return best.url;
}
