// ── Error taxonomy ──

export type ErrorKind =
  | "TransportError"
  | "NotFoundError"
  | "ParseError"
  | "HashComputeError"
  | "ManifestWriteError"
  | "CancelledError"
  | "ConfigError";

export abstract class PinError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or service failure. The only retryable kind. */
export class TransportError extends PinError {
  readonly kind = "TransportError";
  override readonly retryable = true;

  constructor(message: string, public readonly statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NotFoundError extends PinError {
  readonly kind = "NotFoundError";

  constructor(message: string, public readonly resource: string) {
    super(message);
  }
}

export class ParseError extends PinError {
  readonly kind = "ParseError";

  /** Path, field or `line:column` the error points at. */
  constructor(message: string, public readonly location?: string) {
    super(location ? `${message} (at ${location})` : message);
  }
}

export class HashComputeError extends PinError {
  readonly kind = "HashComputeError";

  constructor(public readonly depPath: string, cause: unknown) {
    super(`Could not compute content hash for ${depPath}: ${describeError(cause)}`, { cause });
  }
}

export class ManifestWriteError extends PinError {
  readonly kind = "ManifestWriteError";

  constructor(public readonly filePath: string, cause: unknown) {
    super(`Failed to write manifest ${filePath}: ${describeError(cause)}`, { cause });
  }
}

export class CancelledError extends PinError {
  readonly kind = "CancelledError";

  constructor(message = "Operation cancelled") {
    super(message);
  }
}

export class ConfigError extends PinError {
  readonly kind = "ConfigError";
}

export function isPinError(err: unknown): err is PinError {
  return err instanceof PinError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Throws CancelledError if the signal has fired. */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
