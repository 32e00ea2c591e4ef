import type { Logger } from "./logger.js";
import { errorMessage } from "./errors.js";

export async function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return;

  await new Promise<void>((resolve, reject) => {
    const timeout = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);

    const onAbort = () => {
      cleanup();
      reject(signal?.reason ?? new Error("aborted"));
    };

    const cleanup = () => {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    };

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Rejects with TimeoutError if `fn` has not settled within `timeoutMs`. */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface FixedRetryOptions {
  attempts: number;
  delayMs: number;
  label: string;
  logger: Logger;
}

/**
 * Calls `fn` up to `attempts` times with a fixed delay in between. Rethrows
 * the last error once attempts run out.
 */
export async function retryWithFixedDelay<T>(
  fn: (attempt: number) => Promise<T>,
  options: FixedRetryOptions
): Promise<T> {
  const { attempts, delayMs, label, logger } = options;
  let lastError: unknown = new Error(`${label}: no attempts made`);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      logger.warning(`${label} failed (attempt ${attempt}/${attempts}): ${errorMessage(error)}`);
      if (attempt < attempts) {
        logger.info(`Retrying in ${delayMs}ms...`);
        await wait(delayMs);
      }
    }
  }

  logger.error(`${label}: max attempts reached`);
  throw lastError;
}
