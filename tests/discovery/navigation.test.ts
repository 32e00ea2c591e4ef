import { describe, it, expect } from "vitest";
import { resolveNavigationPage } from "../../src/discovery/navigation.js";
import type { LinkCandidate } from "../../src/documents/types.js";
import { makeLogger } from "../helpers.js";

const PAGE = "https://www.acme.com/";
const EXCLUDED = [".pdf", ".xls", ".xlsx", ".doc", ".docx", ".zip", ".jpg", ".png"];

const link = (anchorText: string, href: string): LinkCandidate => ({
  anchorText,
  href,
  resolvedUrl: new URL(href, PAGE).href,
});

describe("resolveNavigationPage", () => {
  it("prefers the higher-priority keyword", () => {
    const url = resolveNavigationPage(
      PAGE,
      [link("Investors", "/investors"), link("Investor Relations", "/ir-home")],
      ["investor relations", "investors"],
      "Investor Relations",
      EXCLUDED,
      makeLogger()
    );
    expect(url).toBe("https://www.acme.com/ir-home");
  });

  it("prefers text matches over href matches for the same keyword", () => {
    const url = resolveNavigationPage(
      PAGE,
      [link("Learn more", "/investors/"), link("Investors", "/corporate/shareholders")],
      ["investors"],
      "Investor Relations",
      EXCLUDED,
      makeLogger()
    );
    expect(url).toBe("https://www.acme.com/corporate/shareholders");
  });

  it("prefers shorter anchor text when otherwise tied", () => {
    const url = resolveNavigationPage(
      PAGE,
      [
        link("Reports and presentations archive", "/a"),
        link("Reports", "/b"),
      ],
      ["reports"],
      "Financial Reports",
      EXCLUDED,
      makeLogger()
    );
    expect(url).toBe("https://www.acme.com/b");
  });

  it("ignores document links and other sites", () => {
    const logger = makeLogger();
    const url = resolveNavigationPage(
      PAGE,
      [
        link("Annual reports", "/files/annual-reports.pdf"),
        link("Annual reports", "https://filings.example.org/acme"),
      ],
      ["annual reports"],
      "Financial Reports",
      EXCLUDED,
      logger
    );

    expect(url).toBeUndefined();
    expect(logger.warning).toHaveBeenCalledWith(
      "No 'Financial Reports' link found on https://www.acme.com/"
    );
  });

  it("accepts subdomains of the page's site", () => {
    const url = resolveNavigationPage(
      PAGE,
      [link("Investors", "https://investors.acme.com/")],
      ["investors"],
      "Investor Relations",
      EXCLUDED,
      makeLogger()
    );
    expect(url).toBe("https://investors.acme.com/");
  });

  it("follows links from an investor subdomain back to the main site", () => {
    const irPage = "https://investors.acme.com/";
    const url = resolveNavigationPage(
      irPage,
      [
        {
          anchorText: "Annual Reports",
          href: "https://www.acme.com/annual-reports/",
          resolvedUrl: "https://www.acme.com/annual-reports/",
        },
      ],
      ["annual reports"],
      "Financial Reports",
      EXCLUDED,
      makeLogger()
    );
    expect(url).toBe("https://www.acme.com/annual-reports/");
  });
});
