import type { LinkCandidate } from "../documents/types.js";
import type { Logger } from "../logger.js";
import { isSameSite } from "../scoring/domain.js";
import {
  isPdfHref,
  scoreReportLink,
  type ScoringContext,
} from "../scoring/link-scorer.js";

function isAllowedHost(
  url: string,
  homeUrl: string,
  filingHostMarkers: string[]
): boolean {
  if (isSameSite(url, homeUrl)) return true;
  const lower = url.toLowerCase();
  return filingHostMarkers.some((marker) => lower.includes(marker));
}

export function looksLikeListingPage(pageUrl: string, markers: string[]): boolean {
  const lower = pageUrl.toLowerCase();
  return markers.some((marker) => lower.includes(marker));
}

/**
 * Collects every link on the page that scores as a plausible report. When
 * nothing scores and the page looks like a document listing, every same-site
 * PDF on it is taken unscored.
 */
export function extractReportLinks(
  pageUrl: string,
  links: LinkCandidate[],
  homeUrl: string,
  context: ScoringContext,
  logger: Logger
): Set<string> {
  const { rubric } = context;
  const found = new Set<string>();

  for (const link of links) {
    if (!isAllowedHost(link.resolvedUrl, homeUrl, rubric.filingHostMarkers)) {
      logger.debug(`Skipping off-domain link: ${link.resolvedUrl} (home: ${homeUrl})`);
      continue;
    }

    const scored = scoreReportLink(link, context);
    if (scored.accepted) {
      logger.debug(
        `Candidate report link: '${link.anchorText}' (${scored.url}), score ${scored.score}, year ${scored.matchedYear ?? "n/a"}`
      );
      found.add(scored.url);
    }
  }

  if (found.size === 0 && looksLikeListingPage(pageUrl, rubric.listingPathMarkers)) {
    logger.info(`No scored report links on ${pageUrl}, falling back to a PDF scan`);
    for (const link of links) {
      if (isPdfHref(link.href) && isSameSite(link.resolvedUrl, homeUrl)) {
        found.add(link.resolvedUrl);
      }
    }
  }

  logger.info(`Found ${found.size} potential report URLs on ${pageUrl}`);
  return found;
}
