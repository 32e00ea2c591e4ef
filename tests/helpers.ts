import { vi, type Mock } from "vitest";
import { parseConfig, type FinderConfig } from "../src/config.js";
import {
  DATA_POINTS,
  unknownDataPoints,
  type ClassifiedDocument,
  type ContentType,
  type DataPointFlags,
  type TriState,
} from "../src/documents/types.js";
import type { Logger } from "../src/logger.js";
import type { ScoringContext } from "../src/scoring/link-scorer.js";
import { loadDefaultRubric } from "../src/scoring/rubric.js";

export type MockLogger = { [K in keyof Logger]: Mock };

export function makeLogger(): MockLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
  };
}

export function makeConfig(yaml = ""): FinderConfig {
  return parseConfig(yaml);
}

export function makeScoringContext(overrides: Partial<ScoringContext> = {}): ScoringContext {
  return {
    targetYears: ["2024", "2023", "2022", "2021", "2020"],
    currentYear: 2025,
    rubric: loadDefaultRubric(),
    ...overrides,
  };
}

export function dataPoints(yesCount: number): DataPointFlags {
  const flags = unknownDataPoints();
  for (const point of DATA_POINTS.slice(0, yesCount)) {
    flags[point] = "YES";
  }
  return flags;
}

export function makeDoc(
  url: string,
  contentType: ContentType,
  refYear: number | null,
  options: { direct?: TriState; yes?: number; error?: string } = {}
): ClassifiedDocument {
  return {
    url,
    contentType,
    refYear,
    isDirectFileLink: options.direct ?? "UNKNOWN",
    dataPointsPresent: dataPoints(options.yes ?? 0),
    ...(options.error !== undefined ? { error: options.error } : {}),
  };
}
