import type { LinkCandidate } from "../documents/types.js";
import { errorMessage } from "../errors.js";
import type { PageFetcher } from "../fetch/types.js";
import type { Logger } from "../logger.js";
import { wait } from "../retry.js";
import { safeHost, stripWww } from "../scoring/domain.js";
import type { ScoringContext } from "../scoring/link-scorer.js";
import type { SearchProvider } from "../search/google.js";
import { collectLinks } from "./links.js";
import { resolveNavigationPage } from "./navigation.js";
import { buildWebsiteQuery } from "./queries.js";
import { extractReportLinks } from "./report-links.js";

function nameToken(name: string): string {
  const first = name.toLowerCase().split(" ")[0] ?? "";
  return first.replace(/[^\p{L}\p{N}]/gu, "");
}

export function scoreWebsiteCandidate(url: string, name: string): number {
  const domain = stripWww(safeHost(url));
  const token = nameToken(name);
  let score = 0;
  if (token && domain.includes(token)) score += 2;
  if (domain.includes("investor") || domain.includes("ir")) score += 1;
  return score;
}

/** Best guess at the organization's own website among the top search hits. */
export async function findOfficialWebsite(
  name: string,
  search: SearchProvider,
  resultsToCheck: number,
  logger: Logger
): Promise<string | undefined> {
  const hits = await search.search(buildWebsiteQuery(name), resultsToCheck);
  const candidates = hits
    .slice(0, resultsToCheck)
    .filter((hit) => safeHost(hit.link))
    .map((hit) => ({ ...hit, score: scoreWebsiteCandidate(hit.link, name) }))
    .sort((a, b) => b.score - a.score);

  const best = candidates[0];
  if (!best) {
    logger.warning(`No website candidates found for '${name}'`);
    return undefined;
  }

  logger.info(`Selected website for '${name}': ${best.link} (title: '${best.title}')`);
  return best.link;
}

export interface CrawlDeps {
  search: SearchProvider;
  fetcher: PageFetcher;
  scoring: ScoringContext;
  requestDelayMs: number;
  resultsToCheck: number;
  logger: Logger;
}

/**
 * Walks from the homepage to investor relations and the reports index, collecting report
 * links from each page reached. The homepage itself is always a candidate.
 */
export async function crawlWebsite(name: string, deps: CrawlDeps): Promise<Set<string>> {
  const { fetcher, scoring, logger } = deps;
  const { rubric } = scoring;
  const found = new Set<string>();
  const pageLinks = new Map<string, LinkCandidate[]>();

  const loadLinks = async (url: string): Promise<LinkCandidate[] | undefined> => {
    const cached = pageLinks.get(url);
    if (cached) return cached;

    await wait(deps.requestDelayMs);
    try {
      const page = await fetcher.fetchPage(url);
      const links = collectLinks(page.html, url);
      pageLinks.set(url, links);
      return links;
    } catch (error) {
      logger.warning(`Could not load ${url}: ${errorMessage(error)}`);
      return undefined;
    }
  };

  const homeUrl = await findOfficialWebsite(name, deps.search, deps.resultsToCheck, logger);
  if (!homeUrl) return found;
  found.add(homeUrl);

  const homeLinks = await loadLinks(homeUrl);
  if (!homeLinks) return found;

  const pagesToScan = new Set<string>([homeUrl]);

  const irUrl = resolveNavigationPage(
    homeUrl,
    homeLinks,
    rubric.investorRelationsKeywords,
    "Investor Relations",
    rubric.excludedNavigationExtensions,
    logger
  );
  if (irUrl) pagesToScan.add(irUrl);

  const irLinks = irUrl ? await loadLinks(irUrl) : undefined;
  const reportsUrl = resolveNavigationPage(
    irLinks && irUrl ? irUrl : homeUrl,
    irLinks ?? homeLinks,
    rubric.reportsIndexKeywords,
    "Financial Reports",
    rubric.excludedNavigationExtensions,
    logger
  );
  if (reportsUrl) pagesToScan.add(reportsUrl);

  logger.info(`Pages to scan for '${name}': ${[...pagesToScan].join(", ")}`);

  for (const pageUrl of pagesToScan) {
    const links = await loadLinks(pageUrl);
    if (!links) continue;
    for (const url of extractReportLinks(pageUrl, links, homeUrl, scoring, logger)) {
      found.add(url);
    }
  }

  logger.info(`Collected ${found.size} URLs from the website of '${name}'`);
  return found;
}
