import { readFileSync } from "node:fs";
import { z } from "zod";

const keywordList = z
  .array(z.string().min(1))
  .transform((list) => list.map((kw) => kw.toLowerCase()));

export const RubricSchema = z.object({
  reportKeywords: keywordList,
  secondaryKeywords: keywordList,
  avoidKeywords: keywordList,
  investorRelationsKeywords: keywordList,
  reportsIndexKeywords: keywordList,
  filingHostMarkers: keywordList,
  listingPathMarkers: keywordList,
  excludedNavigationExtensions: keywordList,
});

export type Rubric = z.infer<typeof RubricSchema>;

export const RubricOverridesSchema = RubricSchema.partial();

export type RubricOverrides = z.infer<typeof RubricOverridesSchema>;

export interface ScoreWeights {
  targetYear: number;
  recentYear: number;
  reportKeyword: number;
  pdf: number;
  secondaryKeyword: number;
  /** Applied to an avoid keyword when the score is already above `strongScore`. */
  avoidStrong: number;
  avoidWeak: number;
  strongScore: number;
  acceptAt: number;
  /** Lower bar for a PDF link that names a target year. */
  pdfYearAcceptAt: number;
  recentYearWindow: number;
}

export const DEFAULT_WEIGHTS: ScoreWeights = {
  targetYear: 5,
  recentYear: 2,
  reportKeyword: 3,
  pdf: 4,
  secondaryKeyword: 1,
  avoidStrong: -1,
  avoidWeak: -3,
  strongScore: 5,
  acceptAt: 4,
  pdfYearAcceptAt: 2,
  recentYearWindow: 5,
};

const RUBRIC_PATH = new URL("../../data/rubric.json", import.meta.url);

export function loadDefaultRubric(): Rubric {
  const raw: unknown = JSON.parse(readFileSync(RUBRIC_PATH, "utf-8"));
  return RubricSchema.parse(raw);
}

export function resolveRubric(overrides: RubricOverrides = {}): Rubric {
  return { ...loadDefaultRubric(), ...overrides };
}
