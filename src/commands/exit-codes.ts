import type { ErrorKind } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  INVALID_ARGS: 2,
  NOT_FOUND: 3,
  TRANSPORT: 4,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(kind: ErrorKind | "Error"): ExitCode {
  switch (kind) {
    case "ConfigError":
      return EXIT.INVALID_ARGS;
    case "NotFoundError":
      return EXIT.NOT_FOUND;
    case "TransportError":
      return EXIT.TRANSPORT;
    case "CancelledError":
      return EXIT.CANCELLED;
    default:
      return EXIT.FAILED;
  }
}
