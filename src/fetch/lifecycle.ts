import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { PageFetcher } from "./types.js";

/** Releases the fetcher's resources; a failure to close is only logged. */
export async function closeFetcher(
  fetcher: PageFetcher | undefined,
  logger: Logger
): Promise<void> {
  try {
    await fetcher?.close?.();
  } catch (error) {
    logger.warning(`Could not close the page fetcher: ${errorMessage(error)}`);
  }
}
