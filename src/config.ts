import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { RubricOverridesSchema } from "./scoring/rubric.js";

export const DEFAULT_QUERIES = [
  '"{name}" annual consolidated financial statements report results FY "{year:0}" filetype:pdf',
  '"{name}" annual consolidated financial statements report results FY "{year:1}" filetype:pdf',
  '"{name}" investor relations financial reports',
  '"{name}" sustainability report OR ESG report OR Environmental report OR Corporate report OR Responsibility report filetype:pdf',
  '"{name}" financial highlights OR key figures',
  "site:*.{domain_guess}.com investor OR financial OR report OR results OR Download filetype:pdf",
  '"{name}" "annual report" OR "financial results" {year:1} OR {year:0}',
];

const SearchSchema = z.object({
  results_per_query: z.number().int().min(1).max(10).default(5),
  request_delay_ms: z.number().int().nonnegative().default(2000),
  queries: z.array(z.string().min(1)).min(1).default(DEFAULT_QUERIES),
});

const WebsiteDiscoverySchema = z.object({
  enabled: z.boolean().default(true),
  results_to_check: z.number().int().min(1).max(10).default(5),
});

const BrowserSchema = z.object({
  executable_path: z.string().min(1).optional(),
  pool_size: z.number().int().positive().default(1),
});

const FetchSchema = z.object({
  mode: z.enum(["http", "browser"]).default("http"),
  timeout_ms: z.number().int().positive().default(10_000),
  settle_delay_ms: z.number().int().nonnegative().default(5000),
  user_agent: z
    .string()
    .default(
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36"
    ),
  browser: BrowserSchema.default({}),
});

const ClassificationSchema = z.object({
  model: z.string().default("claude-sonnet-4-6"),
  max_attempts: z.number().int().min(1).max(10).default(3),
  retry_delay_ms: z.number().int().nonnegative().default(2000),
  timeout_ms: z.number().int().positive().default(30_000),
  max_tokens: z.number().int().positive().default(512),
});

const ConcurrencySchema = z.object({
  organizations: z.number().int().positive().default(2),
  urls_per_organization: z.number().int().positive().default(4),
});

export const FinderConfigSchema = z
  .object({
    target_years: z
      .array(z.string().regex(/^\d{4}$/, "Must be a 4-digit year"))
      .min(1)
      .default(["2024", "2023", "2022", "2021", "2020"]),
    search: SearchSchema.default({}),
    website_discovery: WebsiteDiscoverySchema.default({}),
    fetch: FetchSchema.default({}),
    classification: ClassificationSchema.default({}),
    concurrency: ConcurrencySchema.default({}),
    rubric: RubricOverridesSchema.default({}),
  })
  .refine(
    (c) => c.fetch.mode !== "browser" || c.fetch.browser.executable_path,
    "fetch.browser.executable_path is required when fetch.mode is browser"
  );

export type FinderConfig = z.infer<typeof FinderConfigSchema>;

export function parseConfig(yamlContent: string): FinderConfig {
  const raw: unknown = parseYaml(yamlContent);
  return FinderConfigSchema.parse(raw ?? {});
}

export function loadConfig(filePath: string): FinderConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}
