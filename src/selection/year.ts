const YEAR_MULTIPLIERS: [minYear: number, multiplier: number][] = [
  [2023, 1.0],
  [2022, 0.8],
  [2021, 0.6],
  [2020, 0.4],
  [2019, 0.2],
];

/** Recency weight of a document's reference year; 0 for unknown or pre-2019 years. */
export function yearMultiplier(year: number | null | undefined): number {
  if (year === null || year === undefined || !Number.isInteger(year)) return 0;
  for (const [minYear, multiplier] of YEAR_MULTIPLIERS) {
    if (year >= minYear) return multiplier;
  }
  return 0;
}
