export type FailureKind =
  | "FetchFailure"
  | "ExtractionFailure"
  | "ClassificationFailure"
  | "NoCandidatesFound";

export class FinderError extends Error {
  public readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class FetchFailure extends FinderError {
  constructor(message: string, cause?: unknown) {
    super("FetchFailure", message, cause);
  }
}

export class ExtractionFailure extends FinderError {
  constructor(message: string, cause?: unknown) {
    super("ExtractionFailure", message, cause);
  }
}

export class ClassificationFailure extends FinderError {
  constructor(message: string, cause?: unknown) {
    super("ClassificationFailure", message, cause);
  }
}

export class NoCandidatesFound extends FinderError {
  constructor(organization: string) {
    super("NoCandidatesFound", `No candidate URLs found for ${organization}`);
  }
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; kind: FailureKind; message: string };

export function failure<T>(kind: FailureKind, message: string): Outcome<T> {
  return { ok: false, kind, message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Maps a thrown value onto the failure taxonomy, defaulting to `fallback`. */
export function toFailure<T>(error: unknown, fallback: FailureKind): Outcome<T> {
  if (error instanceof FinderError) {
    return failure(error.kind, error.message);
  }
  return failure(fallback, errorMessage(error));
}
