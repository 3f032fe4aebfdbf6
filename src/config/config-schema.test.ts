import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { DEFAULT_CONNECTION_OPTIONS, resolveConnectionOptions } from "../types/config.js";
import { Level } from "../types/level.js";

describe("connection option validation", () => {
  it("applies every default for empty options", () => {
    expect(resolveConnectionOptions()).toEqual(DEFAULT_CONNECTION_OPTIONS);
  });

  it("uses the documented defaults", () => {
    const options = resolveConnectionOptions({});
    expect(options.host).toBeUndefined();
    expect(options.port).toBe(4228);
    expect(options.room).toBe("default");
    expect(options.timeoutMs).toBe(30_000);
    expect(options.reconnect).toEqual({ enabled: true, intervalMs: 3000 });
    expect(options.backlog).toEqual({
      enabled: true,
      capacityBytes: 2_097_152,
      flushOn: Level.Error,
      keepOpen: true,
    });
    expect(options.async).toEqual({
      enabled: true,
      capacityBytes: 2_097_152,
      throttle: false,
      clearOnDisconnect: false,
    });
  });

  it("merges nested sections field by field", () => {
    const options = resolveConnectionOptions({
      backlog: { flushOn: Level.Warning },
      async: { throttle: true },
    });
    expect(options.backlog.flushOn).toBe(Level.Warning);
    expect(options.backlog.capacityBytes).toBe(DEFAULT_CONNECTION_OPTIONS.backlog.capacityBytes);
    expect(options.async.throttle).toBe(true);
    expect(options.async.enabled).toBe(true);
  });

  it("ignores explicitly undefined fields", () => {
    expect(resolveConnectionOptions({ port: undefined, reconnect: { intervalMs: undefined } }).port).toBe(
      4228,
    );
  });

  it("rejects port 0 and ports above 65535", () => {
    expect(() => resolveConnectionOptions({ port: 0 })).toThrow(ConfigurationError);
    expect(() => resolveConnectionOptions({ port: 70000 })).toThrow("Invalid connection options: port:");
  });

  it("rejects a capacity smaller than the smallest frame", () => {
    expect(() => resolveConnectionOptions({ async: { capacityBytes: 10 } })).toThrow(
      "async.capacityBytes",
    );
  });

  it("rejects a negative reconnect interval", () => {
    expect(() => resolveConnectionOptions({ reconnect: { intervalMs: -1 } })).toThrow(
      ConfigurationError,
    );
  });

  it("accepts a zero reconnect interval", () => {
    expect(resolveConnectionOptions({ reconnect: { intervalMs: 0 } }).reconnect.intervalMs).toBe(0);
  });

  it("rejects an empty host", () => {
    expect(() => resolveConnectionOptions({ host: "  " })).toThrow("host");
  });
});
