import {
  errorDocument,
  type ClassifiedDocument,
} from "../documents/types.js";
import {
  errorMessage,
  failure,
  toFailure,
  type Outcome,
} from "../errors.js";
import type { ExtractedContent } from "../extract/content.js";
import type { DownloadedContent } from "../fetch/http.js";
import type { Logger } from "../logger.js";
import { retryWithFixedDelay, withTimeout } from "../retry.js";
import type { StructuredClassifier } from "./llm.js";

export interface ClassifierAdapterDeps {
  download: (url: string) => Promise<DownloadedContent>;
  extract: (
    url: string,
    bytes: Uint8Array,
    contentType: string
  ) => Promise<ExtractedContent>;
  classifier: StructuredClassifier;
  maxAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
  logger: Logger;
}

async function fetchAndExtract(
  url: string,
  deps: ClassifierAdapterDeps
): Promise<Outcome<ExtractedContent>> {
  let downloaded: DownloadedContent;
  try {
    downloaded = await deps.download(url);
  } catch (error) {
    return toFailure(error, "FetchFailure");
  }

  try {
    return {
      ok: true,
      value: await deps.extract(url, downloaded.bytes, downloaded.contentType),
    };
  } catch (error) {
    return toFailure(error, "ExtractionFailure");
  }
}

export async function classifyOutcome(
  url: string,
  deps: ClassifierAdapterDeps
): Promise<Outcome<ClassifiedDocument>> {
  const content = await fetchAndExtract(url, deps);
  if (!content.ok) return content;

  const { title, snippet } = content.value;
  try {
    const classification = await retryWithFixedDelay(
      () =>
        withTimeout(`Classification of ${url}`, deps.timeoutMs, (signal) =>
          deps.classifier.classify(url, title, snippet, signal)
        ),
      {
        attempts: deps.maxAttempts,
        delayMs: deps.retryDelayMs,
        label: `Classification of ${url}`,
        logger: deps.logger,
      }
    );
    return { ok: true, value: { url, ...classification } };
  } catch (error) {
    return failure(
      "ClassificationFailure",
      `Classification failed after ${deps.maxAttempts} attempts: ${errorMessage(error)}`
    );
  }
}

/**
 * Fetches, extracts and classifies one URL. Never rejects: every failure
 * comes back as an ERROR document describing what went wrong.
 */
export async function classifyUrl(
  url: string,
  deps: ClassifierAdapterDeps
): Promise<ClassifiedDocument> {
  deps.logger.info(`Classifying ${url}`);
  const outcome = await classifyOutcome(url, deps);
  if (outcome.ok) return outcome.value;

  deps.logger.warning(`${outcome.kind} for ${url}: ${outcome.message}`);
  return errorDocument(url, `${outcome.kind}: ${outcome.message}`);
}
