import { describe, expect, it } from "vitest";
import { LogshipError } from "../errors.js";
import { DiagnosticLevel, parseDiagnosticLevel, StructuredLogger } from "./structured-logger.js";

function capture(options: { level?: DiagnosticLevel; component?: string } = {}) {
  const lines: string[] = [];
  const logger = new StructuredLogger({ writer: (line) => lines.push(line), ...options });
  const parsed = (index: number): Record<string, unknown> => JSON.parse(lines[index] ?? "null");
  return { lines, logger, parsed };
}

describe("StructuredLogger", () => {
  it("outputs JSON lines to the writer", () => {
    const { logger, parsed } = capture();

    logger.info("connected", { port: 4228 });

    const entry = parsed(0);
    expect(entry.level).toBe("info");
    expect(entry.msg).toBe("connected");
    expect(entry.port).toBe(4228);
    expect(entry.time).toBeTypeOf("string");
  });

  it("respects level filtering", () => {
    const { lines, logger } = capture({ level: DiagnosticLevel.WARN });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("visible");
    logger.error("visible");

    expect(lines).toHaveLength(2);
  });

  it("tags entries with the component, also through child loggers", () => {
    const { logger, parsed } = capture({ component: "client" });

    logger.info("a");
    logger.child("sender").info("b");

    expect(parsed(0).component).toBe("client");
    expect(parsed(1).component).toBe("sender");
  });

  it("serializes errors with their code and stack", () => {
    const { logger, parsed } = capture();

    logger.error("failed", { error: new LogshipError("boom", "CONNECT_FAILED") });

    const entry = parsed(0);
    expect(entry.error).toBe("boom");
    expect(entry.errorCode).toBe("CONNECT_FAILED");
    expect(entry.errorStack).toContain("boom");
  });

  it("writes bigint values as strings", () => {
    const { logger, parsed } = capture();

    logger.debug("stats", { sent: 12n });

    expect(parsed(0).sent).toBe("12");
  });

  it("does not let ctx overwrite reserved fields", () => {
    const { logger, parsed } = capture({ component: "test" });

    logger.info("real", { level: "debug", time: "fake", msg: "injected", component: "evil" });

    const entry = parsed(0);
    expect(entry.level).toBe("info");
    expect(entry.msg).toBe("real");
    expect(entry.component).toBe("test");
    expect(entry.time).not.toBe("fake");
  });

  it("survives circular references in ctx", () => {
    const { lines, logger, parsed } = capture();
    const circular: Record<string, unknown> = { key: "value" };
    circular.self = circular;

    logger.error("circular data", circular);

    expect(lines).toHaveLength(1);
    expect(parsed(0)).toMatchObject({ msg: "circular data", serializationError: true });
  });
});

describe("parseDiagnosticLevel", () => {
  it("maps names case-insensitively", () => {
    expect(parseDiagnosticLevel("WARN")).toBe(DiagnosticLevel.WARN);
    expect(parseDiagnosticLevel(" debug ")).toBe(DiagnosticLevel.DEBUG);
  });

  it("returns undefined for unknown or missing names", () => {
    expect(parseDiagnosticLevel("verbose")).toBeUndefined();
    expect(parseDiagnosticLevel(undefined)).toBeUndefined();
  });
});
