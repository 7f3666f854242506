export type HarvestErrorCode =
  | "FETCH_ERROR"
  | "PARSE_ERROR"
  | "UNKNOWN_SOURCE"
  | "IO_ERROR"
  | "INVALID_RANGE"
  | "CONFIG_ERROR";

export class HarvestError extends Error {
  public readonly code: HarvestErrorCode;
  public readonly retryable: boolean;

  constructor(
    message: string,
    options: { code: HarvestErrorCode; retryable?: boolean; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * - transient: network failure, timeout, 408/425/429/5xx; retried up to the bound
 * - permanent: any other HTTP error or an over-size body; never retried
 * - cancelled: the run's abort signal fired
 */
export type FetchFailureKind = "transient" | "permanent" | "cancelled";

export class FetchError extends HarvestError {
  public readonly kind: FetchFailureKind;
  public readonly url: string;
  public readonly statusCode?: number;
  /** Server-requested delay (Retry-After) before the next attempt. */
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: {
      kind: FetchFailureKind;
      url: string;
      statusCode?: number;
      retryAfterMs?: number;
      cause?: unknown;
    },
  ) {
    super(message, {
      code: "FETCH_ERROR",
      retryable: options.kind === "transient",
      cause: options.cause,
    });
    this.kind = options.kind;
    this.url = options.url;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class ParseError extends HarvestError {
  public readonly url?: string;

  constructor(message: string, url?: string, cause?: unknown) {
    super(message, { code: "PARSE_ERROR", cause });
    this.url = url;
  }
}

export class UnknownSourceError extends HarvestError {
  public readonly sourceId: string;

  constructor(sourceId: string, known: string[]) {
    super(`Unknown source "${sourceId}". Available sources: ${known.join(", ")}`, {
      code: "UNKNOWN_SOURCE",
    });
    this.sourceId = sourceId;
  }
}

export class IOError extends HarvestError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { code: "IO_ERROR", cause });
    this.path = path;
  }
}

export class InvalidRangeError extends HarvestError {
  constructor(message: string) {
    super(message, { code: "INVALID_RANGE" });
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string) {
    super(message, { code: "CONFIG_ERROR" });
  }
}

export function isHarvestError(error: unknown): error is HarvestError {
  return error instanceof HarvestError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
