export class UpstreamUnavailableError extends Error {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, options: { status?: number; retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "UpstreamUnavailableError";
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class ArtifactNotFoundError extends Error {
  readonly filename: string;

  constructor(filename: string) {
    super(`Artifact not found: ${filename}`);
    this.name = "ArtifactNotFoundError";
    this.filename = filename;
  }
}

const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

export function toHttpStatus(error: unknown): number {
  if (error instanceof InvalidInputError) return 400;
  if (error instanceof ArtifactNotFoundError) return 404;
  if (error instanceof MalformedResponseError) return 502;
  if (error instanceof UpstreamUnavailableError) return 503;
  if (isAbortError(error)) return 499;
  return 500;
}
