import {
  ALTERNATE_SLOTS,
  DATA_POINTS,
  type ClassifiedDocument,
  type ContentType,
  type OrganizationResult,
  type ScoredDocument,
} from "../documents/types.js";
import { yearMultiplier } from "./year.js";

export const LANDING_PAGE_WEIGHT = 0.5;
export const DEMOTED_REPORT_WEIGHT = 0.75;
const MIN_DATA_POINTS = 2;

const CONTENT_TYPE_PREFERENCE: Partial<Record<ContentType, number>> = {
  ANNUAL_REPORT_DOCUMENT: 3,
  FINANCIAL_DATA_PAGE: 2,
  INVESTOR_HUB_INDEX: 1,
};

/** Share of data points flagged YES, or 0 when fewer than two are. */
export function dataPointScore(doc: ClassifiedDocument): number {
  const present = DATA_POINTS.filter(
    (point) => doc.dataPointsPresent[point] === "YES"
  ).length;
  return present >= MIN_DATA_POINTS ? present / DATA_POINTS.length : 0;
}

function yearOrLowest(doc: ClassifiedDocument): number {
  return doc.refYear ?? -1;
}

export function scoreDocument(doc: ClassifiedDocument): ScoredDocument {
  if (doc.error !== undefined || doc.contentType === "ERROR") {
    return { ...doc, calculatedScore: 0, selectionCategory: "ERROR" };
  }

  const { contentType, refYear } = doc;
  const multiplier = yearMultiplier(refYear);

  if (refYear !== null && contentType === "ANNUAL_REPORT_DOCUMENT") {
    if (doc.isDirectFileLink === "YES") {
      return { ...doc, calculatedScore: multiplier, selectionCategory: "POTENTIAL_FIN_REP" };
    }
    return {
      ...doc,
      calculatedScore: LANDING_PAGE_WEIGHT * multiplier,
      selectionCategory: "POTENTIAL_OTHER_REPORT_LANDING_PAGE",
    };
  }

  if (refYear !== null && contentType === "FINANCIAL_DATA_PAGE") {
    return {
      ...doc,
      calculatedScore: dataPointScore(doc) * multiplier,
      selectionCategory: "POTENTIAL_OTHER_FINANCIAL_DATA_PAGE",
    };
  }

  return {
    ...doc,
    calculatedScore: dataPointScore(doc) * multiplier,
    selectionCategory: "POTENTIAL_OTHER_GENERIC",
  };
}

function byScoreThenYear(a: ScoredDocument, b: ScoredDocument): number {
  return b.calculatedScore - a.calculatedScore || yearOrLowest(b) - yearOrLowest(a);
}

function byYearThenTypeThenScore(a: ScoredDocument, b: ScoredDocument): number {
  return (
    yearOrLowest(b) - yearOrLowest(a) ||
    (CONTENT_TYPE_PREFERENCE[b.contentType] ?? 0) -
      (CONTENT_TYPE_PREFERENCE[a.contentType] ?? 0) ||
    b.calculatedScore - a.calculatedScore
  );
}

export function choosePrimary(scored: ScoredDocument[]): ScoredDocument | null {
  const [best] = scored
    .filter((doc) => doc.selectionCategory === "POTENTIAL_FIN_REP")
    .sort(byScoreThenYear);

  if (!best || best.calculatedScore <= 0) return null;
  return { ...best, finalTypeForOutput: "FIN_REP" };
}

/**
 * Alternates candidates: every report not chosen as primary, discounted,
 * plus every other scored document except errors.
 */
export function buildAlternatesPool(
  scored: ScoredDocument[],
  primary: ScoredDocument | null
): ScoredDocument[] {
  const pool: ScoredDocument[] = [];

  for (const doc of scored) {
    if (primary && doc.url === primary.url) continue;

    if (doc.selectionCategory === "POTENTIAL_FIN_REP") {
      pool.push({
        ...doc,
        calculatedScore: DEMOTED_REPORT_WEIGHT * yearMultiplier(doc.refYear),
        selectionCategory: "DEMOTED_FIN_REP_AS_OTHER",
        finalTypeForOutput: "OTHER",
      });
    } else if (doc.selectionCategory !== "ERROR") {
      pool.push({ ...doc, finalTypeForOutput: "OTHER" });
    }
  }

  return pool.sort(byScoreThenYear);
}

/**
 * Picks one primary report and exactly ALTERNATE_SLOTS alternates from the
 * classified documents of one organization. Alternates come first from the
 * scored pool, then from leftover documents ranked by year and content
 * type; remaining slots are null. No URL is emitted twice.
 */
export function selectEvidence(documents: ClassifiedDocument[]): OrganizationResult {
  const scored = documents.map(scoreDocument);
  const primary = choosePrimary(scored);

  const seen = new Set<string>();
  if (primary) seen.add(primary.url);

  const alternates: ScoredDocument[] = [];

  for (const doc of buildAlternatesPool(scored, primary)) {
    if (alternates.length >= ALTERNATE_SLOTS) break;
    if (seen.has(doc.url)) continue;
    if (doc.calculatedScore <= 0 && doc.refYear === null) continue;

    alternates.push(doc);
    seen.add(doc.url);
  }

  if (alternates.length < ALTERNATE_SLOTS) {
    const fillers = scored
      .filter((doc) => doc.selectionCategory !== "ERROR" && !seen.has(doc.url))
      .sort(byYearThenTypeThenScore);

    for (const doc of fillers) {
      if (alternates.length >= ALTERNATE_SLOTS) break;
      if (seen.has(doc.url)) continue;

      alternates.push({ ...doc, finalTypeForOutput: "OTHER" });
      seen.add(doc.url);
    }
  }

  return {
    primary,
    alternates: [
      ...alternates,
      ...Array.from({ length: ALTERNATE_SLOTS - alternates.length }, () => null),
    ],
  };
}
