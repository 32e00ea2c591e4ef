import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { DEFAULT_QUERIES, parseConfig } from "../src/config.js";

const fixture = (name: string) =>
  readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");

describe("parseConfig", () => {
  it("parses a full valid config", () => {
    const config = parseConfig(fixture("valid-config.yml"));

    expect(config.target_years).toEqual(["2025", "2024", "2023"]);
    expect(config.search.results_per_query).toBe(8);
    expect(config.search.request_delay_ms).toBe(500);
    expect(config.website_discovery.results_to_check).toBe(3);
    expect(config.fetch.mode).toBe("browser");
    expect(config.fetch.browser.executable_path).toBe("/usr/bin/chromium");
    expect(config.fetch.browser.pool_size).toBe(2);
    expect(config.classification.model).toBe("claude-haiku-4-5");
    expect(config.classification.max_attempts).toBe(5);
    expect(config.concurrency.urls_per_organization).toBe(6);
    expect(config.rubric.avoidKeywords).toEqual(["quarterly", "draft"]);
  });

  it("applies defaults for a minimal config", () => {
    const config = parseConfig(fixture("minimal-config.yml"));

    expect(config.target_years).toEqual(["2024", "2023", "2022", "2021", "2020"]);
    expect(config.search.results_per_query).toBe(5);
    expect(config.search.request_delay_ms).toBe(2000);
    expect(config.search.queries).toEqual(DEFAULT_QUERIES);
    expect(config.website_discovery.enabled).toBe(true);
    expect(config.fetch.mode).toBe("http");
    expect(config.classification.model).toBe("claude-sonnet-4-6");
    expect(config.classification.max_attempts).toBe(3);
    expect(config.classification.retry_delay_ms).toBe(2000);
    expect(config.concurrency.organizations).toBe(2);
    expect(config.rubric).toEqual({});
  });

  it("treats an empty document as all defaults", () => {
    expect(parseConfig("").classification.max_attempts).toBe(3);
  });

  it("requires an executable path in browser mode", () => {
    expect(() => parseConfig(fixture("invalid-browser.yml"))).toThrow(
      "executable_path is required"
    );
  });

  it("rejects malformed target years", () => {
    expect(() => parseConfig(`target_years: ["FY24"]`)).toThrow();
  });

  it("rejects too many search results per query", () => {
    expect(() =>
      parseConfig(`
search:
  results_per_query: 50
`)
    ).toThrow();
  });
});
