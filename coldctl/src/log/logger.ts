export type OutputFormat = "human" | "jsonl";

export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

/**
 * Operator-facing output. `code` is a stable machine-readable tag
 * (e.g. "BUNDLE_BUILT"), `message` the human sentence.
 */
export interface Logger {
  info(code: string, message: string, fields?: LogFields): void;
  warn(code: string, message: string, fields?: LogFields): void;
  error(code: string, message: string, fields?: LogFields): void;
  /** Byte-level transfer progress. */
  progress(label: string, transferred: number, total: number): void;
}

type Sink = { write(chunk: string): unknown };

/**
 * Human format prints messages (warnings and errors to stderr);
 * jsonl prints one `{level, code, message, ...fields}` object per line to stdout.
 */
export function createLogger(format: OutputFormat, out: Sink = process.stdout, err: Sink = process.stderr): Logger {
  const emit = (level: LogLevel, code: string, message: string, fields?: LogFields): void => {
    if (format === "jsonl") {
      out.write(JSON.stringify({ level, code, message, ...fields }) + "\n");
      return;
    }
    (level === "info" ? out : err).write(`${message}\n`);
  };

  let lastPercent = -1;

  return {
    info: (code, message, fields) => emit("info", code, message, fields),
    warn: (code, message, fields) => emit("warn", code, message, fields),
    error: (code, message, fields) => emit("error", code, message, fields),
    progress: (label, transferred, total) => {
      const percent = total > 0 ? Math.floor((transferred / total) * 100) : 100;
      if (percent === lastPercent) return;
      lastPercent = percent;
      if (format === "jsonl") {
        out.write(JSON.stringify({ level: "info", code: "PROGRESS", label, transferred, total, percent }) + "\n");
      } else {
        err.write(`\r${label}: ${percent}%${percent >= 100 ? "\n" : ""}`);
      }
    },
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  progress: () => undefined,
};
