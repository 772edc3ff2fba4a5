// src/output.ts — Output sinks
// Commands and pipelines receive a sink instead of writing to the terminal themselves.

import type { Warning } from "./types.js";

export interface OutputSink {
  /** Plain line, no prefix. */
  write(line: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only emitted when verbose output is on. */
  verbose(message: string): void;
}

export interface StreamSinkOptions {
  quiet?: boolean;
  verbose?: boolean;
  stream?: NodeJS.WritableStream;
}

/**
 * Default sink: prefixed lines on stderr. Quiet mode keeps errors only.
 */
export function createStreamSink(options: StreamSinkOptions = {}): OutputSink {
  const stream = options.stream ?? process.stderr;
  const quiet = options.quiet ?? false;
  const verbose = options.verbose ?? false;
  const emit = (line: string) => {
    stream.write(line + "\n");
  };

  return {
    write: (line) => {
      if (!quiet) emit(line);
    },
    info: (message) => {
      if (!quiet) emit(`[INFO] ${message}`);
    },
    success: (message) => {
      if (!quiet) emit(`[ok] ${message}`);
    },
    warn: (message) => {
      if (!quiet) emit(`[warn] ${message}`);
    },
    error: (message) => emit(`[error] ${message}`),
    verbose: (message) => {
      if (verbose && !quiet) emit(`[INFO] ${message}`);
    },
  };
}

export interface BufferedSink extends OutputSink {
  lines: string[];
}

/** Records every line, including verbose ones. Used by tests and dry runs. */
export function createBufferedSink(): BufferedSink {
  const lines: string[] = [];
  return {
    lines,
    write: (line) => lines.push(line),
    info: (message) => lines.push(`[INFO] ${message}`),
    success: (message) => lines.push(`[ok] ${message}`),
    warn: (message) => lines.push(`[warn] ${message}`),
    error: (message) => lines.push(`[error] ${message}`),
    verbose: (message) => lines.push(`[verbose] ${message}`),
  };
}

/** Forward accumulated pipeline warnings to a sink. */
export function reportWarnings(sink: OutputSink, warnings: Warning[]): void {
  for (const w of warnings) {
    const where = w.file ? ` (${w.file})` : "";
    const line = `${w.module}: ${w.message}${where}`;
    if (w.level === "error") sink.error(line);
    else if (w.level === "warn") sink.warn(line);
    else sink.verbose(line);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
