import { Level } from "../types/level.js";

/** Control packets always pass; everything else must reach the threshold. */
export function admits(level: Level, threshold: Level): boolean {
  return level === Level.Control || level >= threshold;
}

export interface AdmissionState {
  readonly enabled: boolean;
  /** Client-wide threshold. */
  readonly level: Level;
}

/**
 * A session packet goes out only while the client is enabled and its level
 * clears both the client-wide and the session threshold.
 */
export function sessionAdmits(client: AdmissionState, sessionThreshold: Level, level: Level): boolean {
  return client.enabled && admits(level, client.level) && admits(level, sessionThreshold);
}
