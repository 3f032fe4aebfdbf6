/**
 * Severity levels shared by sessions, the level filter and the backlog's
 * flush-on threshold. Values are part of the wire format.
 * @module
 */

export enum Level {
  Debug = 0,
  Verbose = 1,
  Message = 2,
  Warning = 3,
  Error = 4,
  Fatal = 5,
  /** Reserved for control commands and the log header. */
  Control = 6,
}

/** Levels a caller may pick for its own messages. */
export type CallerLevel = Exclude<Level, Level.Control>;

const LEVEL_NAMES: Record<Level, string> = {
  [Level.Debug]: "debug",
  [Level.Verbose]: "verbose",
  [Level.Message]: "message",
  [Level.Warning]: "warning",
  [Level.Error]: "error",
  [Level.Fatal]: "fatal",
  [Level.Control]: "control",
};

export const ALL_LEVELS: readonly Level[] = [
  Level.Debug,
  Level.Verbose,
  Level.Message,
  Level.Warning,
  Level.Error,
  Level.Fatal,
  Level.Control,
];

const LEVELS_BY_NAME = new Map<string, Level>(ALL_LEVELS.map((level) => [LEVEL_NAMES[level], level]));

export function levelName(level: Level): string {
  return LEVEL_NAMES[level];
}

export function isLevel(value: unknown): value is Level {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 6;
}

/** Case-insensitive level lookup; undefined for unknown names. */
export function parseLevel(value: string | number): Level | undefined {
  if (typeof value === "number") return isLevel(value) ? value : undefined;
  const trimmed = value.trim().toLowerCase();
  if (/^\d+$/.test(trimmed)) {
    const numeric = Number(trimmed);
    return isLevel(numeric) ? numeric : undefined;
  }
  return LEVELS_BY_NAME.get(trimmed);
}
