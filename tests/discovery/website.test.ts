import { describe, it, expect, vi } from "vitest";
import {
  crawlWebsite,
  findOfficialWebsite,
  scoreWebsiteCandidate,
  type CrawlDeps,
} from "../../src/discovery/website.js";
import { FetchFailure } from "../../src/errors.js";
import type { PageFetcher } from "../../src/fetch/types.js";
import type { SearchHit, SearchProvider } from "../../src/search/google.js";
import { makeLogger, makeScoringContext } from "../helpers.js";

const PAGES: Record<string, string> = {
  "https://www.acme.com/": `
    <a href="/investors">Investors</a>
    <a href="/about">About</a>`,
  "https://www.acme.com/investors": `
    <a href="/investors/reports">Annual reports</a>
    <a href="/files/ar-2024.pdf">Annual Report 2024</a>`,
  "https://www.acme.com/investors/reports": `
    <a href="/files/ar-2023.pdf">Annual Report 2023</a>
    <a href="/files/ar-2024.pdf">Annual Report 2024</a>`,
};

function makeSearch(hits: SearchHit[]): SearchProvider {
  return { search: vi.fn(async () => hits) };
}

function makeFetcher(pages: Record<string, string>) {
  return {
    fetchPage: vi.fn(async (url: string) => {
      const html = pages[url];
      if (html === undefined) throw new FetchFailure(`HTTP 404 for ${url}`);
      return { url, html, fullyLoaded: true };
    }),
  } satisfies PageFetcher;
}

function makeDeps(search: SearchProvider, fetcher: PageFetcher): CrawlDeps {
  return {
    search,
    fetcher,
    scoring: makeScoringContext(),
    requestDelayMs: 0,
    resultsToCheck: 5,
    logger: makeLogger(),
  };
}

describe("scoreWebsiteCandidate", () => {
  it("rewards the name token and investor-looking domains", () => {
    expect(scoreWebsiteCandidate("https://investors.acme.com/", "Acme Corp")).toBe(3);
    expect(scoreWebsiteCandidate("https://www.acme.com/", "ACME, Inc.")).toBe(2);
    expect(scoreWebsiteCandidate("https://www.news.example/acme", "Acme Corp")).toBe(0);
  });
});

describe("findOfficialWebsite", () => {
  it("picks the best scoring hit", async () => {
    const search = makeSearch([
      { link: "https://www.news.example/acme", title: "Acme news" },
      { link: "https://www.acme.com/", title: "Acme" },
    ]);

    const url = await findOfficialWebsite("Acme Corp", search, 5, makeLogger());

    expect(url).toBe("https://www.acme.com/");
    expect(search.search).toHaveBeenCalledWith("Acme Corp official website investor", 5);
  });

  it("keeps search order on ties", async () => {
    const search = makeSearch([
      { link: "https://alpha.example/", title: "" },
      { link: "https://beta.example/", title: "" },
    ]);
    expect(await findOfficialWebsite("Zeta", search, 5, makeLogger())).toBe("https://alpha.example/");
  });

  it("returns undefined without hits", async () => {
    expect(await findOfficialWebsite("Acme", makeSearch([]), 5, makeLogger())).toBeUndefined();
  });
});

describe("crawlWebsite", () => {
  it("walks homepage, investor relations and reports pages", async () => {
    const fetcher = makeFetcher(PAGES);
    const search = makeSearch([{ link: "https://www.acme.com/", title: "Acme" }]);

    const found = await crawlWebsite("Acme Corp", makeDeps(search, fetcher));

    expect([...found]).toEqual([
      "https://www.acme.com/",
      "https://www.acme.com/investors/reports",
      "https://www.acme.com/files/ar-2024.pdf",
      "https://www.acme.com/files/ar-2023.pdf",
    ]);
    expect(fetcher.fetchPage).toHaveBeenCalledTimes(3);
  });

  it("returns nothing when no website is found", async () => {
    const fetcher = makeFetcher(PAGES);
    const found = await crawlWebsite("Acme Corp", makeDeps(makeSearch([]), fetcher));

    expect(found.size).toBe(0);
    expect(fetcher.fetchPage).not.toHaveBeenCalled();
  });

  it("keeps the homepage as a candidate when it cannot be loaded", async () => {
    const search = makeSearch([{ link: "https://www.acme.com/", title: "Acme" }]);
    const found = await crawlWebsite("Acme Corp", makeDeps(search, makeFetcher({})));

    expect([...found]).toEqual(["https://www.acme.com/"]);
  });
});
