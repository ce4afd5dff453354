import type { ProgressEvent } from "../core/orchestrator.js";

export type OutputFormat = "human" | "jsonl";

export type Level = "info" | "warn" | "error";

export type Writable = { write(chunk: string): unknown };

export type Diagnostic = {
  level: Level;
  code: string;
  message: string;
  [field: string]: unknown;
};

/**
 * Single sink for everything a command prints. `human` writes one line per
 * message (warnings and errors to stderr); `jsonl` writes one JSON object
 * per line to stdout.
 */
export class Reporter {
  constructor(
    readonly format: OutputFormat,
    private readonly out: Writable = process.stdout,
    private readonly err: Writable = process.stderr,
  ) {}

  info(code: string, message: string, fields?: Record<string, unknown>): void {
    this.emit({ level: "info", code, message, ...fields });
  }

  warn(code: string, message: string, fields?: Record<string, unknown>): void {
    this.emit({ level: "warn", code, message, ...fields });
  }

  error(code: string, message: string, fields?: Record<string, unknown>): void {
    this.emit({ level: "error", code, message, ...fields });
  }

  /** Progress events from the orchestrator. */
  progress(event: ProgressEvent): void {
    const code = `${event.step.toUpperCase()}_${event.phase.toUpperCase()}`;
    if (this.format === "jsonl") {
      this.emit({ level: event.phase === "failed" ? "error" : "info", code, message: event.message, step: event.step, at: event.at });
      return;
    }
    const line = `[${event.step}] ${event.message}`;
    if (event.phase === "failed") this.err.write(line + "\n");
    else this.out.write(line + "\n");
  }

  private emit(diagnostic: Diagnostic): void {
    if (this.format === "jsonl") {
      this.out.write(JSON.stringify(diagnostic) + "\n");
      return;
    }
    const stream = diagnostic.level === "info" ? this.out : this.err;
    const prefix = diagnostic.level === "info" ? "" : `${diagnostic.level}: `;
    stream.write(prefix + diagnostic.message + "\n");
  }
}
