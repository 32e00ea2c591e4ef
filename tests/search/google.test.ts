import { describe, it, expect, vi } from "vitest";
import { GoogleSearchProvider, buildSearchUrl } from "../../src/search/google.js";
import { makeLogger } from "../helpers.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function makeProvider(fetchFn: typeof fetch) {
  const logger = makeLogger();
  const provider = new GoogleSearchProvider({
    apiKey: "test-key",
    engineId: "test-cx",
    logger,
    fetchFn,
  });
  return { provider, logger };
}

describe("buildSearchUrl", () => {
  it("encodes key, engine, query and count", () => {
    expect(buildSearchUrl("acme annual report", 5, "test-key", "test-cx")).toBe(
      "https://www.googleapis.com/customsearch/v1?key=test-key&cx=test-cx&q=acme+annual+report&num=5"
    );
  });
});

describe("GoogleSearchProvider", () => {
  it("returns hits with links, in order", async () => {
    const fetchFn = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) =>
      jsonResponse({
        items: [
          { link: "https://acme.com/ar-2024.pdf", title: "Annual Report 2024" },
          { title: "no link" },
          { link: "https://acme.com/investors" },
        ],
      })
    );
    const { provider } = makeProvider(fetchFn);

    const hits = await provider.search("acme annual report", 5);

    expect(hits).toEqual([
      { link: "https://acme.com/ar-2024.pdf", title: "Annual Report 2024" },
      { link: "https://acme.com/investors", title: "" },
    ]);
    expect(fetchFn).toHaveBeenCalledWith(
      buildSearchUrl("acme annual report", 5, "test-key", "test-cx")
    );
  });

  it("caps hits at the requested count", async () => {
    const { provider } = makeProvider(async () =>
      jsonResponse({ items: [{ link: "https://a.example/" }, { link: "https://b.example/" }] })
    );
    expect(await provider.search("q", 1)).toEqual([{ link: "https://a.example/", title: "" }]);
  });

  it("returns an empty list when there are no items", async () => {
    const { provider, logger } = makeProvider(async () => jsonResponse({}));

    expect(await provider.search("nothing", 5)).toEqual([]);
    expect(logger.warning).toHaveBeenCalledWith("No search results for: nothing");
  });

  it("returns an empty list on a non-2xx status", async () => {
    const { provider, logger } = makeProvider(async () => jsonResponse({ error: "quota" }, 429));

    expect(await provider.search("q", 5)).toEqual([]);
    expect(logger.warning).toHaveBeenCalledWith("Search API returned 429 for: q");
  });

  it("returns an empty list on an unexpected payload", async () => {
    const { provider } = makeProvider(async () => jsonResponse({ items: "nope" }));
    expect(await provider.search("q", 5)).toEqual([]);
  });

  it("returns an empty list when the request throws", async () => {
    const { provider, logger } = makeProvider(async () => {
      throw new Error("socket hang up");
    });

    expect(await provider.search("q", 5)).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith('Search failed for "q": socket hang up');
  });

  it("spaces calls made through one instance, even when they overlap", async () => {
    const startedAt: number[] = [];
    const provider = new GoogleSearchProvider({
      apiKey: "test-key",
      engineId: "test-cx",
      logger: makeLogger(),
      minIntervalMs: 40,
      fetchFn: async () => {
        startedAt.push(Date.now());
        return jsonResponse({ items: [] });
      },
    });

    await Promise.all([
      provider.search("first", 5),
      provider.search("second", 5),
      provider.search("third", 5),
    ]);

    expect(startedAt).toHaveLength(3);
    expect(startedAt[1] - startedAt[0]).toBeGreaterThanOrEqual(35);
    expect(startedAt[2] - startedAt[1]).toBeGreaterThanOrEqual(35);
  });
});
