export interface FetchedPage {
  url: string;
  html: string;
  /** False when the page timed out and `html` is whatever had rendered. */
  fullyLoaded: boolean;
}

export interface PageFetcher {
  fetchPage(url: string): Promise<FetchedPage>;
  close?(): Promise<void>;
}
