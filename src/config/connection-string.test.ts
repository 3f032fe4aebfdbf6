import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { Level } from "../types/level.js";
import {
  parseBoolean,
  parseConnectionString,
  parseDurationMs,
  parseSizeBytes,
} from "./connection-string.js";

describe("parseConnectionString", () => {
  it("parses every documented key", () => {
    const options = parseConnectionString(
      "tcp(host=console.local, port=4300, room=qa, timeout=5s, reconnect=true, " +
        "reconnect.interval=2s, backlog.enabled=yes, backlog.queue=4mb, backlog.flushon=warning, " +
        "backlog.keepopen=false, async.enabled=1, async.queue=512, async.throttle=true, " +
        "async.clearondisconnect=no)",
    );
    expect(options).toEqual({
      host: "console.local",
      port: 4300,
      room: "qa",
      timeoutMs: 5000,
      reconnect: { enabled: true, intervalMs: 2000 },
      backlog: { enabled: true, capacityBytes: 4 * 1024 * 1024, flushOn: Level.Warning, keepOpen: false },
      async: { enabled: true, capacityBytes: 512 * 1024, throttle: true, clearOnDisconnect: false },
    });
  });

  it("treats keys and the tcp prefix case-insensitively", () => {
    expect(parseConnectionString("TCP(Host=h,PORT=1)")).toEqual({ host: "h", port: 1 });
  });

  it("accepts an empty body and trailing commas", () => {
    expect(parseConnectionString("tcp()")).toEqual({});
    expect(parseConnectionString("tcp(port=9,)")).toEqual({ port: 9 });
  });

  it("supports the shorthand aliases", () => {
    expect(parseConnectionString("tcp(backlog=64kb, flushon=fatal, keepopen=false)")).toEqual({
      backlog: { enabled: true, capacityBytes: 64 * 1024, flushOn: Level.Fatal, keepOpen: false },
    });
    expect(parseConnectionString("tcp(backlog=0)")).toEqual({ backlog: { enabled: false } });
  });

  it("rejects a descriptor without the tcp wrapper", () => {
    expect(() => parseConnectionString("host=x")).toThrow(ConfigurationError);
    expect(() => parseConnectionString("pipe(name=x)")).toThrow("must look like tcp(");
  });

  it("rejects unknown keys", () => {
    expect(() => parseConnectionString("tcp(hots=x)")).toThrow('Unknown connection option "hots"');
  });

  it("rejects pairs without a value separator", () => {
    expect(() => parseConnectionString("tcp(host)")).toThrow('Expected key=value in connection descriptor, got "host"');
  });

  it("rejects bad values", () => {
    expect(() => parseConnectionString("tcp(port=abc)")).toThrow(
      'Invalid value "abc" for connection option "port"',
    );
    expect(() => parseConnectionString("tcp(reconnect=maybe)")).toThrow(ConfigurationError);
    expect(() => parseConnectionString("tcp(flushon=loud)")).toThrow(ConfigurationError);
    expect(() => parseConnectionString("tcp(host=)")).toThrow(ConfigurationError);
  });
});

describe("value parsers", () => {
  it("parses booleans", () => {
    expect(parseBoolean("k", "YES")).toBe(true);
    expect(parseBoolean("k", "0")).toBe(false);
    expect(() => parseBoolean("k", "on")).toThrow(ConfigurationError);
  });

  it("parses sizes in kilobytes by default", () => {
    expect(parseSizeBytes("k", "2048")).toBe(2_097_152);
    expect(parseSizeBytes("k", "1.5 MB")).toBe(1_572_864);
    expect(parseSizeBytes("k", "1gb")).toBe(1024 ** 3);
    expect(() => parseSizeBytes("k", "-1")).toThrow(ConfigurationError);
  });

  it("parses durations in milliseconds by default", () => {
    expect(parseDurationMs("k", "250")).toBe(250);
    expect(parseDurationMs("k", "250ms")).toBe(250);
    expect(parseDurationMs("k", "1.5s")).toBe(1500);
    expect(() => parseDurationMs("k", "3m")).toThrow(ConfigurationError);
  });
});
