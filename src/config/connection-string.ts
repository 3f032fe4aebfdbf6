/**
 * Connection descriptor parser.
 *
 * Grammar: `tcp(key=value,key=value,…)`. Keys are case-insensitive, values
 * are trimmed. Sizes are kilobytes unless suffixed `kb`, `mb` or `gb`;
 * durations are milliseconds unless suffixed `ms` or `s`.
 * @module
 */

import { ConfigurationError } from "../errors.js";
import type { ConnectionOptions } from "../types/config.js";
import { type Level, parseLevel } from "../types/level.js";

const DESCRIPTOR = /^tcp\s*\(([\s\S]*)\)$/i;
const SIZE = /^(\d+(?:\.\d+)?)\s*(kb|mb|gb)?$/i;
const DURATION = /^(\d+(?:\.\d+)?)\s*(ms|s)?$/i;

const SIZE_FACTORS: Record<string, number> = { kb: 1024, mb: 1024 ** 2, gb: 1024 ** 3 };

export function parseConnectionString(descriptor: string): ConnectionOptions {
  const match = DESCRIPTOR.exec(descriptor.trim());
  if (!match) {
    throw new ConfigurationError(`Connection descriptor must look like tcp(key=value,...), got "${descriptor}"`);
  }

  const options: ConnectionOptions = {};
  const body = match[1] ?? "";
  for (const pair of body.split(",")) {
    if (pair.trim() === "") continue;
    const eq = pair.indexOf("=");
    if (eq === -1) throw new ConfigurationError(`Expected key=value in connection descriptor, got "${pair.trim()}"`);
    const key = pair.slice(0, eq).trim().toLowerCase();
    const value = pair.slice(eq + 1).trim();
    applyOption(options, key, value);
  }
  return options;
}

function applyOption(options: ConnectionOptions, key: string, value: string): void {
  switch (key) {
    case "host":
      if (value === "") throw invalid(key, value);
      options.host = value;
      return;
    case "port":
      options.port = parseInteger(key, value);
      return;
    case "room":
      if (value === "") throw invalid(key, value);
      options.room = value;
      return;
    case "timeout":
      options.timeoutMs = parseDurationMs(key, value);
      return;

    case "reconnect":
      options.reconnect = { ...options.reconnect, enabled: parseBoolean(key, value) };
      return;
    case "reconnect.interval":
      options.reconnect = { ...options.reconnect, intervalMs: parseDurationMs(key, value) };
      return;

    case "backlog.enabled":
      options.backlog = { ...options.backlog, enabled: parseBoolean(key, value) };
      return;
    case "backlog.queue":
      options.backlog = { ...options.backlog, capacityBytes: parseSizeBytes(key, value) };
      return;
    case "backlog": {
      // Shorthand: a size enables the backlog, zero disables it
      const size = parseSizeBytes(key, value);
      options.backlog =
        size > 0
          ? { ...options.backlog, enabled: true, capacityBytes: size }
          : { ...options.backlog, enabled: false };
      return;
    }
    case "backlog.flushon":
    case "flushon":
      options.backlog = { ...options.backlog, flushOn: parseLevelValue(key, value) };
      return;
    case "backlog.keepopen":
    case "keepopen":
      options.backlog = { ...options.backlog, keepOpen: parseBoolean(key, value) };
      return;

    case "async.enabled":
      options.async = { ...options.async, enabled: parseBoolean(key, value) };
      return;
    case "async.queue":
      options.async = { ...options.async, capacityBytes: parseSizeBytes(key, value) };
      return;
    case "async.throttle":
      options.async = { ...options.async, throttle: parseBoolean(key, value) };
      return;
    case "async.clearondisconnect":
      options.async = { ...options.async, clearOnDisconnect: parseBoolean(key, value) };
      return;

    default:
      throw new ConfigurationError(`Unknown connection option "${key}"`);
  }
}

export function parseBoolean(key: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw invalid(key, value);
  }
}

/** Kilobytes by default; returns bytes. */
export function parseSizeBytes(key: string, value: string): number {
  const match = SIZE.exec(value);
  if (!match) throw invalid(key, value);
  const factor = SIZE_FACTORS[(match[2] ?? "kb").toLowerCase()] ?? 1024;
  return Math.floor(Number(match[1]) * factor);
}

/** Milliseconds by default. */
export function parseDurationMs(key: string, value: string): number {
  const match = DURATION.exec(value);
  if (!match) throw invalid(key, value);
  const amount = Number(match[1]);
  return Math.round(match[2]?.toLowerCase() === "s" ? amount * 1000 : amount);
}

function parseInteger(key: string, value: string): number {
  if (!/^\d+$/.test(value)) throw invalid(key, value);
  return Number(value);
}

function parseLevelValue(key: string, value: string): Level {
  const level = parseLevel(value);
  if (level === undefined) throw invalid(key, value);
  return level;
}

function invalid(key: string, value: string): ConfigurationError {
  return new ConfigurationError(`Invalid value "${value}" for connection option "${key}"`);
}
