import { chromium, errors, type Browser, type Page } from "playwright-core";
import type { Logger } from "../logger.js";
import { FetchFailure, errorMessage } from "../errors.js";
import { wait } from "../retry.js";
import { SessionPool } from "./session-pool.js";
import type { FetchedPage, PageFetcher } from "./types.js";

export const CONSENT_BUTTON_TEXTS = [
  "accept all",
  "allow all",
  "agree",
  "got it",
  "ok",
  "okay",
  "continue",
  "accept cookies",
  "understand",
  "i accept",
  "allow cookies",
  "einverstanden",
  "akzeptieren",
  "zulassen",
  "alle akzeptieren",
];

const CONSENT_CONTAINER_SELECTOR = [
  "cookie",
  "consent",
  "banner",
  "privacy",
  "gdpr",
]
  .map((term) => `button[id*="${term}"], button[class*="${term}"]`)
  .join(", ");

const CONSENT_CLICK_TIMEOUT_MS = 1000;

export interface BrowserFetchOptions {
  executablePath: string;
  poolSize: number;
  timeoutMs: number;
  settleDelayMs: number;
  userAgent: string;
  logger: Logger;
}

/**
 * Best-effort click on a cookie consent control. Returns true when something
 * was clicked; a page without a banner is not an error.
 */
export async function dismissCookieBanner(page: Page, logger: Logger): Promise<boolean> {
  for (const text of CONSENT_BUTTON_TEXTS) {
    const name = new RegExp(`\\b${text}\\b`, "i");
    for (const role of ["button", "link"] as const) {
      const target = page.getByRole(role, { name }).first();
      try {
        if (await target.isVisible()) {
          await target.click({ timeout: CONSENT_CLICK_TIMEOUT_MS });
          logger.info(`Clicked cookie consent ${role} '${text}'`);
          return true;
        }
      } catch (error) {
        logger.debug(`Consent ${role} '${text}' not clickable: ${errorMessage(error)}`);
      }
    }
  }

  const fallback = page.locator(CONSENT_CONTAINER_SELECTOR).first();
  try {
    if (await fallback.isVisible()) {
      await fallback.click({ timeout: CONSENT_CLICK_TIMEOUT_MS });
      logger.info("Clicked cookie consent element by id/class");
      return true;
    }
  } catch (error) {
    logger.debug(`Consent element not clickable: ${errorMessage(error)}`);
  }

  logger.debug("No cookie consent control found");
  return false;
}

export class BrowserPageFetcher implements PageFetcher {
  private constructor(
    private readonly browser: Browser,
    private readonly pool: SessionPool<Page>,
    private readonly options: BrowserFetchOptions
  ) {}

  static async launch(options: BrowserFetchOptions): Promise<BrowserPageFetcher> {
    options.logger.info(`Launching headless browser (${options.poolSize} session(s))`);
    const browser = await chromium.launch({
      executablePath: options.executablePath,
      headless: true,
      args: ["--disable-gpu", "--no-sandbox", "--disable-dev-shm-usage"],
    });

    const pages: Page[] = [];
    for (let i = 0; i < options.poolSize; i++) {
      const context = await browser.newContext({
        userAgent: options.userAgent,
        viewport: { width: 1920, height: 1080 },
      });
      pages.push(await context.newPage());
    }

    return new BrowserPageFetcher(browser, new SessionPool(pages), options);
  }

  async fetchPage(url: string): Promise<FetchedPage> {
    const { logger, timeoutMs, settleDelayMs } = this.options;

    return this.pool.withSession(async (page) => {
      logger.info(`Fetching with browser: ${url}`);
      try {
        await page.goto(url, { timeout: timeoutMs, waitUntil: "domcontentloaded" });
        await wait(settleDelayMs / 2);

        if (await dismissCookieBanner(page, logger)) {
          await wait(settleDelayMs / 2);
        }

        await page.waitForLoadState("load", { timeout: timeoutMs });
        return { url, html: await page.content(), fullyLoaded: true };
      } catch (error) {
        if (error instanceof errors.TimeoutError) {
          logger.warning(`Timeout loading ${url}, keeping partial content`);
          const html = await page.content().catch(() => "");
          if (html) return { url, html, fullyLoaded: false };
        }
        throw new FetchFailure(`Browser could not load ${url}: ${errorMessage(error)}`, error);
      }
    });
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
