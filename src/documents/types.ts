export const CONTENT_TYPES = [
  "ANNUAL_REPORT_DOCUMENT",
  "FINANCIAL_DATA_PAGE",
  "NEWS_OR_PRESS_RELEASE",
  "INVESTOR_HUB_INDEX",
  "OTHER",
  "ERROR",
  "UNKNOWN",
] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export type TriState = "YES" | "NO" | "UNKNOWN";

export const DATA_POINTS = [
  "country_hq",
  "employees",
  "net_turnover",
  "total_assets",
] as const;

export type DataPoint = (typeof DATA_POINTS)[number];

export type DataPointFlags = Record<DataPoint, TriState>;

export type SelectionCategory =
  | "ERROR"
  | "POTENTIAL_FIN_REP"
  | "POTENTIAL_OTHER_FINANCIAL_DATA_PAGE"
  | "POTENTIAL_OTHER_REPORT_LANDING_PAGE"
  | "POTENTIAL_OTHER_GENERIC"
  | "DEMOTED_FIN_REP_AS_OTHER";

export type OutputType = "FIN_REP" | "OTHER";

/** A link found while scanning a page, before any scoring. */
export interface LinkCandidate {
  href: string;
  anchorText: string;
  resolvedUrl: string;
}

export interface ScoredLink {
  url: string;
  score: number;
  accepted: boolean;
  matchedYear?: string;
  priorityRank?: number;
}

/**
 * One candidate URL after classification. `error` is set exactly when
 * `contentType` is "ERROR".
 */
export interface ClassifiedDocument {
  url: string;
  contentType: ContentType;
  refYear: number | null;
  isDirectFileLink: TriState;
  dataPointsPresent: DataPointFlags;
  error?: string;
}

/** A document after the selection engine has scored and placed it. */
export interface ScoredDocument extends ClassifiedDocument {
  calculatedScore: number;
  selectionCategory: SelectionCategory;
  finalTypeForOutput?: OutputType;
}

export const ALTERNATE_SLOTS = 5;

export interface OrganizationResult {
  primary: ScoredDocument | null;
  /** Always exactly ALTERNATE_SLOTS entries; `null` marks an empty slot. */
  alternates: (ScoredDocument | null)[];
}

export interface Organization {
  id: string;
  name: string;
}

export function unknownDataPoints(): DataPointFlags {
  return {
    country_hq: "UNKNOWN",
    employees: "UNKNOWN",
    net_turnover: "UNKNOWN",
    total_assets: "UNKNOWN",
  };
}

export function errorDocument(url: string, error: string): ClassifiedDocument {
  return {
    url,
    contentType: "ERROR",
    refYear: null,
    isDirectFileLink: "UNKNOWN",
    dataPointsPresent: unknownDataPoints(),
    error,
  };
}

export function emptyResult(): OrganizationResult {
  return {
    primary: null,
    alternates: Array.from({ length: ALTERNATE_SLOTS }, () => null),
  };
}
