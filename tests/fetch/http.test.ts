import { describe, it, expect, vi } from "vitest";
import { FetchFailure } from "../../src/errors.js";
import { HttpPageFetcher, download } from "../../src/fetch/http.js";
import { makeLogger } from "../helpers.js";

const OPTIONS = { timeoutMs: 1000, userAgent: "test-agent" };

describe("download", () => {
  it("returns the body bytes and lowercased content type", async () => {
    const fetchFn = vi.fn(
      async (_input: RequestInfo | URL, _init?: RequestInit) =>
        new Response("%PDF-1.7", { headers: { "Content-Type": "Application/PDF" } })
    );

    const result = await download("https://acme.com/ar.pdf", { ...OPTIONS, fetchFn });

    expect(new TextDecoder().decode(result.bytes)).toBe("%PDF-1.7");
    expect(result.contentType).toBe("application/pdf");
    expect(fetchFn).toHaveBeenCalledWith(
      "https://acme.com/ar.pdf",
      expect.objectContaining({ headers: { "User-Agent": "test-agent" }, redirect: "follow" })
    );
  });

  it("defaults a missing content type to an empty string", async () => {
    const fetchFn = async () => new Response(new Uint8Array([1, 2, 3]));
    const result = await download("https://acme.com/blob", { ...OPTIONS, fetchFn });

    expect(result.contentType).toBe("");
    expect([...result.bytes]).toEqual([1, 2, 3]);
  });

  it("turns non-2xx responses into a FetchFailure", async () => {
    const fetchFn = async () => new Response("gone", { status: 404 });
    const attempt = download("https://acme.com/missing", { ...OPTIONS, fetchFn });

    await expect(attempt).rejects.toBeInstanceOf(FetchFailure);
    await expect(attempt).rejects.toThrow("HTTP 404 for https://acme.com/missing");
  });

  it("wraps network errors", async () => {
    const fetchFn = async () => {
      throw new TypeError("fetch failed");
    };

    await expect(download("https://acme.com/", { ...OPTIONS, fetchFn })).rejects.toThrow(
      "Could not fetch https://acme.com/: fetch failed"
    );
  });
});

describe("HttpPageFetcher", () => {
  it("decodes the page as text", async () => {
    const fetcher = new HttpPageFetcher({
      ...OPTIONS,
      logger: makeLogger(),
      fetchFn: async () =>
        new Response("<html><body>Bericht</body></html>", {
          headers: { "content-type": "text/html; charset=utf-8" },
        }),
    });

    expect(await fetcher.fetchPage("https://acme.com/")).toEqual({
      url: "https://acme.com/",
      html: "<html><body>Bericht</body></html>",
      fullyLoaded: true,
    });
  });
});
