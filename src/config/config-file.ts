import { existsSync, readFileSync } from "node:fs";
import { ConfigurationError, errorMessage } from "../errors.js";
import { type Level, parseLevel } from "../types/level.js";
import { parseBoolean } from "./connection-string.js";

/** Settings a configuration file may carry. Absent keys stay undefined. */
export interface ClientConfiguration {
  appName?: string;
  level?: Level;
  defaultLevel?: Level;
  enabled?: boolean;
  /** Raw connection descriptor, placeholders not yet expanded. */
  connections?: string;
}

/**
 * Parse `key = value` lines. `#` and `;` start comments, `[section]` headers
 * are ignored and keys are case-insensitive.
 */
export function parseConfigurationText(text: string): Record<string, string> {
  const values: Record<string, string> = {};
  const lines = text.split(/\r?\n/);
  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (line === "" || line.startsWith("#") || line.startsWith(";")) return;
    if (line.startsWith("[") && line.endsWith("]")) return;
    const eq = line.search(/[=:]/);
    if (eq <= 0) throw new ConfigurationError(`Line ${index + 1}: expected "key = value", got "${line}"`);
    values[line.slice(0, eq).trim().toLowerCase()] = line.slice(eq + 1).trim();
  });
  return values;
}

export function toClientConfiguration(values: Record<string, string>): ClientConfiguration {
  const config: ClientConfiguration = {};
  if (values.appname !== undefined) config.appName = values.appname;
  if (values.level !== undefined) config.level = requireLevel("level", values.level);
  if (values.defaultlevel !== undefined) {
    config.defaultLevel = requireLevel("defaultlevel", values.defaultlevel);
  }
  if (values.enabled !== undefined) config.enabled = parseBoolean("enabled", values.enabled);
  if (values.connections !== undefined && values.connections !== "") {
    config.connections = values.connections;
  }
  return config;
}

/** Read a configuration file. A missing file yields undefined. */
export function readConfigurationFile(path: string): ClientConfiguration | undefined {
  if (!existsSync(path)) return undefined;
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read configuration file ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return toClientConfiguration(parseConfigurationText(text));
}

function requireLevel(key: string, value: string): Level {
  const level = parseLevel(value);
  if (level === undefined) throw new ConfigurationError(`Invalid value "${value}" for "${key}"`);
  return level;
}
