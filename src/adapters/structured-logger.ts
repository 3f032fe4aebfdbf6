import type { Logger } from "../interfaces/logger.js";

/** Severity of the client's own diagnostics, not of shipped packets. */
export enum DiagnosticLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<DiagnosticLevel, string> = {
  [DiagnosticLevel.DEBUG]: "debug",
  [DiagnosticLevel.INFO]: "info",
  [DiagnosticLevel.WARN]: "warn",
  [DiagnosticLevel.ERROR]: "error",
};

const LEVELS = [
  DiagnosticLevel.DEBUG,
  DiagnosticLevel.INFO,
  DiagnosticLevel.WARN,
  DiagnosticLevel.ERROR,
] as const;

/** `"warn"` → DiagnosticLevel.WARN; undefined for anything unknown. */
export function parseDiagnosticLevel(name: string | undefined): DiagnosticLevel | undefined {
  if (name === undefined) return undefined;
  const wanted = name.trim().toLowerCase();
  return LEVELS.find((level) => LEVEL_NAMES[level] === wanted);
}

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: DiagnosticLevel;
  component?: string;
}

/** One JSON object per line, on stderr unless a writer is given. */
export class StructuredLogger implements Logger {
  private writer: (line: string) => void;
  private level: DiagnosticLevel;
  private component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? DiagnosticLevel.DEBUG;
    this.component = options.component;
  }

  /** A logger sharing this writer and level, tagged with `component`. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({ writer: this.writer, level: this.level, component });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(DiagnosticLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(DiagnosticLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(DiagnosticLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(DiagnosticLevel.ERROR, msg, ctx);
  }

  private emit(level: DiagnosticLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {};
    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (value instanceof Error) {
          entry[key] = value.message;
          entry[`${key}Code`] = "code" in value ? value.code : undefined;
          entry[`${key}Stack`] = value.stack;
        } else {
          entry[key] = value;
        }
      }
    }
    // Reserved fields win over ctx
    const time = new Date().toISOString();
    entry.time = time;
    entry.level = LEVEL_NAMES[level];
    entry.msg = msg;
    if (this.component) entry.component = this.component;

    try {
      this.writer(JSON.stringify(entry, bigintReplacer));
    } catch {
      // Circular ctx: keep the message, lose the context
      this.writer(
        JSON.stringify({ time, level: LEVEL_NAMES[level], msg, serializationError: true }),
      );
    }
  }
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
