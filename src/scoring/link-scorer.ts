import type { LinkCandidate, ScoredLink } from "../documents/types.js";
import { isSameSite } from "./domain.js";
import { DEFAULT_WEIGHTS, type Rubric, type ScoreWeights } from "./rubric.js";

export interface ScoringContext {
  /** Most recent first. */
  targetYears: string[];
  currentYear: number;
  rubric: Rubric;
  weights?: ScoreWeights;
}

const ANY_YEAR = /\b(19[89]\d|20\d{2})\b/g;
const TEXT_MATCH_BONUS = 2;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function containsWord(haystack: string, word: string): boolean {
  return new RegExp(`\\b${escapeRegExp(word)}\\b`).test(haystack);
}

function findTargetYear(
  text: string,
  href: string,
  targetYears: string[]
): string | undefined {
  return targetYears.find(
    (year) => containsWord(text, year) || containsWord(href, year)
  );
}

function hasRecentYear(
  text: string,
  href: string,
  context: ScoringContext,
  window: number
): boolean {
  const newest = parseInt(context.targetYears[0] ?? "", 10);
  if (Number.isNaN(newest)) return false;
  const earliest = newest - window;

  const years = [...text.matchAll(ANY_YEAR), ...href.matchAll(ANY_YEAR)].map(
    (m) => parseInt(m[1], 10)
  );
  return years.some((y) => y >= earliest && y <= context.currentYear);
}

function compact(keyword: string): string {
  return keyword.replace(/ /g, "");
}

export function isPdfHref(href: string): boolean {
  return href.toLowerCase().endsWith(".pdf");
}

/**
 * Scores a link as a possible annual report. `accepted` reflects the two
 * acceptance rules: a plain score bar, or a lower bar for PDFs that name a
 * target year.
 */
export function scoreReportLink(
  link: LinkCandidate,
  context: ScoringContext
): ScoredLink {
  const weights = context.weights ?? DEFAULT_WEIGHTS;
  const { rubric } = context;
  const text = link.anchorText.toLowerCase();
  const href = link.href.toLowerCase();

  let score = 0;

  const matchedYear = findTargetYear(text, href, context.targetYears);
  if (matchedYear) {
    score += weights.targetYear;
  } else if (hasRecentYear(text, href, context, weights.recentYearWindow)) {
    score += weights.recentYear;
  }

  if (
    rubric.reportKeywords.some(
      (kw) => text.includes(kw) || href.includes(compact(kw))
    )
  ) {
    score += weights.reportKeyword;
  }

  const pdf = isPdfHref(href);
  if (pdf) {
    score += weights.pdf;
  }

  if (
    score < weights.strongScore &&
    rubric.secondaryKeywords.some((kw) => text.includes(kw) || href.includes(kw))
  ) {
    score += weights.secondaryKeyword;
  }

  if (rubric.avoidKeywords.some((kw) => text.includes(kw) || href.includes(kw))) {
    score += score > weights.strongScore ? weights.avoidStrong : weights.avoidWeak;
  }

  const accepted =
    score >= weights.acceptAt ||
    (pdf && matchedYear !== undefined && score >= weights.pdfYearAcceptAt);

  return { url: link.resolvedUrl, score, accepted, matchedYear };
}

export interface NavigationMatch {
  index: number;
  textMatch: boolean;
}

/** First keyword (by list order) found in the anchor text or a path segment of the href. */
export function matchNavigationKeyword(
  anchorText: string,
  href: string,
  keywords: string[]
): NavigationMatch | undefined {
  const text = anchorText.toLowerCase();
  const h = href.toLowerCase();

  for (let index = 0; index < keywords.length; index++) {
    const keyword = keywords[index];
    const joined = compact(keyword);
    const dashed = keyword.replace(/ /g, "-");

    const textMatch = text.includes(keyword);
    const hrefMatch =
      h.includes(`/${joined}/`) ||
      h.includes(`/${dashed}/`) ||
      h.endsWith(joined) ||
      h.endsWith(dashed) ||
      h.includes(`${joined}.`);

    if (textMatch || hrefMatch) {
      return { index, textMatch };
    }
  }
  return undefined;
}

/**
 * Navigation-mode scoring: no year or file signals, and off-site links are
 * dropped outright. `priorityRank` is the matched keyword's index.
 */
export function scoreNavigationLink(
  link: LinkCandidate,
  pageUrl: string,
  keywords: string[]
): ScoredLink | undefined {
  if (!isSameSite(link.resolvedUrl, pageUrl)) return undefined;

  const match = matchNavigationKeyword(link.anchorText, link.href, keywords);
  if (!match) return undefined;

  return {
    url: link.resolvedUrl,
    score: match.textMatch ? TEXT_MATCH_BONUS : 0,
    accepted: true,
    priorityRank: match.index,
  };
}
