import type { Logger } from "../logger.js";
import { FetchFailure, errorMessage } from "../errors.js";
import type { FetchedPage, PageFetcher } from "./types.js";

export interface HttpFetchOptions {
  timeoutMs: number;
  userAgent: string;
  logger: Logger;
  fetchFn?: typeof fetch;
}

export interface DownloadedContent {
  bytes: Uint8Array;
  contentType: string;
}

/** GET with a timeout. Failed requests and non-2xx statuses throw FetchFailure. */
export async function download(
  url: string,
  options: Omit<HttpFetchOptions, "logger">
): Promise<DownloadedContent> {
  const fetchFn = options.fetchFn ?? fetch;
  let response: Response;
  try {
    response = await fetchFn(url, {
      headers: { "User-Agent": options.userAgent },
      redirect: "follow",
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new FetchFailure(`Could not fetch ${url}: ${errorMessage(error)}`, error);
  }

  if (!response.ok) {
    throw new FetchFailure(`HTTP ${response.status} for ${url}`);
  }

  return {
    bytes: new Uint8Array(await response.arrayBuffer()),
    contentType: (response.headers.get("content-type") ?? "").toLowerCase(),
  };
}

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly options: HttpFetchOptions) {}

  async fetchPage(url: string): Promise<FetchedPage> {
    this.options.logger.info(`Fetching page: ${url}`);
    const { bytes } = await download(url, this.options);
    return {
      url,
      html: new TextDecoder().decode(bytes),
      fullyLoaded: true,
    };
  }
}
