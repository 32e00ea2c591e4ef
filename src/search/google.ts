import { z } from "zod";
import type { Logger } from "../logger.js";
import { errorMessage } from "../errors.js";
import { wait } from "../retry.js";

const GOOGLE_CSE_URL = "https://www.googleapis.com/customsearch/v1";

export interface SearchHit {
  link: string;
  title: string;
}

export interface SearchProvider {
  /** Never rejects: errors and empty responses both yield an empty list. */
  search(query: string, resultCount: number): Promise<SearchHit[]>;
}

const ResponseSchema = z.object({
  items: z
    .array(
      z.object({
        link: z.string().optional(),
        title: z.string().optional(),
      })
    )
    .optional(),
});

export interface GoogleSearchOptions {
  apiKey: string;
  engineId: string;
  logger: Logger;
  /** Minimum gap between the starts of two API calls made through this instance. */
  minIntervalMs?: number;
  fetchFn?: typeof fetch;
}

export function buildSearchUrl(
  query: string,
  resultCount: number,
  apiKey: string,
  engineId: string
): string {
  const url = new URL(GOOGLE_CSE_URL);
  url.searchParams.set("key", apiKey);
  url.searchParams.set("cx", engineId);
  url.searchParams.set("q", query);
  url.searchParams.set("num", String(resultCount));
  return url.toString();
}

export class GoogleSearchProvider implements SearchProvider {
  private readonly fetchFn: typeof fetch;
  private queue: Promise<void> = Promise.resolve();
  private lastCallAt: number | undefined;

  constructor(private readonly options: GoogleSearchOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /** Callers take turns; each turn starts `minIntervalMs` after the previous one. */
  private reserveSlot(): Promise<void> {
    const slot = this.queue.then(async () => {
      if (this.lastCallAt !== undefined) {
        await wait(this.lastCallAt + (this.options.minIntervalMs ?? 0) - Date.now());
      }
      this.lastCallAt = Date.now();
    });
    this.queue = slot;
    return slot;
  }

  async search(query: string, resultCount: number): Promise<SearchHit[]> {
    const { apiKey, engineId, logger } = this.options;
    await this.reserveSlot();
    logger.info(`Searching: ${query}`);

    try {
      const response = await this.fetchFn(
        buildSearchUrl(query, resultCount, apiKey, engineId)
      );
      if (!response.ok) {
        logger.warning(`Search API returned ${response.status} for: ${query}`);
        return [];
      }

      const parsed = ResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.warning(`Unexpected search API response for: ${query}`);
        return [];
      }

      const hits: SearchHit[] = [];
      for (const item of parsed.data.items ?? []) {
        if (item.link) {
          hits.push({ link: item.link, title: item.title ?? "" });
        }
      }

      if (hits.length === 0) {
        logger.warning(`No search results for: ${query}`);
      }
      return hits.slice(0, resultCount);
    } catch (error) {
      logger.error(`Search failed for "${query}": ${errorMessage(error)}`);
      return [];
    }
  }
}
