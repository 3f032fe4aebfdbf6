/**
 * Logger writing through the console, each line tagged `[logship]` or a
 * custom prefix. Messages below `level` are skipped.
 */

import type { Logger } from "../interfaces/logger.js";
import { DiagnosticLevel } from "./structured-logger.js";

type ConsoleMethod = "debug" | "log" | "warn" | "error";

export interface ConsoleLoggerOptions {
  prefix?: string;
  level?: DiagnosticLevel;
  console?: Pick<Console, ConsoleMethod>;
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly level: DiagnosticLevel;
  private readonly sink: Pick<Console, ConsoleMethod>;

  constructor(options: ConsoleLoggerOptions | string = {}) {
    const resolved = typeof options === "string" ? { prefix: options } : options;
    this.prefix = resolved.prefix ?? "logship";
    this.level = resolved.level ?? DiagnosticLevel.DEBUG;
    this.sink = resolved.console ?? console;
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.write(DiagnosticLevel.DEBUG, "debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.write(DiagnosticLevel.INFO, "log", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.write(DiagnosticLevel.WARN, "warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.write(DiagnosticLevel.ERROR, "error", msg, ctx);
  }

  private write(
    level: DiagnosticLevel,
    method: ConsoleMethod,
    msg: string,
    ctx?: Record<string, unknown>,
  ): void {
    if (level < this.level) return;
    const formatted = `[${this.prefix}] ${msg}`;
    if (ctx) {
      this.sink[method](formatted, ctx);
    } else {
      this.sink[method](formatted);
    }
  }
}
