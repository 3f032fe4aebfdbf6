import { connectionOptionsSchema, describeIssues } from "../config/config-schema.js";
import { ConfigurationError } from "../errors.js";
import { Level } from "./level.js";

/** Connection options as callers write them. Every field is optional. */
export interface ConnectionOptions {
  /** Console host. Unset means 127.0.0.1, or the WSL gateway under WSL. */
  host?: string;
  port?: number; // default: 4228
  room?: string; // default: "default"
  timeoutMs?: number; // default: 30000

  reconnect?: {
    enabled?: boolean; // default: true
    /** Minimum time between the starts of two attempts. */
    intervalMs?: number; // default: 3000
  };

  backlog?: {
    enabled?: boolean; // default: true
    capacityBytes?: number; // default: 2 MiB
    /** Appending a packet at or above this level requests a flush. */
    flushOn?: Level; // default: Level.Error
    /** When false the connection is opened only for flush bursts. */
    keepOpen?: boolean; // default: true
  };

  async?: {
    enabled?: boolean; // default: true
    capacityBytes?: number; // default: 2 MiB
    /** Producers wait for space instead of evicting the oldest packets. */
    throttle?: boolean; // default: false
    clearOnDisconnect?: boolean; // default: false
  };
}

export interface ResolvedConnectionOptions {
  host: string | undefined;
  port: number;
  room: string;
  timeoutMs: number;
  reconnect: Required<NonNullable<ConnectionOptions["reconnect"]>>;
  backlog: Required<NonNullable<ConnectionOptions["backlog"]>>;
  async: Required<NonNullable<ConnectionOptions["async"]>>;
}

export const DEFAULT_CONNECTION_OPTIONS: ResolvedConnectionOptions = {
  host: undefined,
  port: 4228,
  room: "default",
  timeoutMs: 30_000,
  reconnect: {
    enabled: true,
    intervalMs: 3000,
  },
  backlog: {
    enabled: true,
    capacityBytes: 2048 * 1024,
    flushOn: Level.Error,
    keepOpen: true,
  },
  async: {
    enabled: true,
    capacityBytes: 2048 * 1024,
    throttle: false,
    clearOnDisconnect: false,
  },
};

export function resolveConnectionOptions(options: ConnectionOptions = {}): ResolvedConnectionOptions {
  // Validate before merging so a bad value never reaches the pipeline
  const validation = connectionOptionsSchema.safeParse(options);
  if (!validation.success) {
    throw new ConfigurationError(`Invalid connection options: ${describeIssues(validation.error)}`, {
      cause: validation.error,
    });
  }

  const user = validation.data;
  const defaults = DEFAULT_CONNECTION_OPTIONS;
  return {
    host: user.host ?? defaults.host,
    port: user.port ?? defaults.port,
    room: user.room ?? defaults.room,
    timeoutMs: user.timeoutMs ?? defaults.timeoutMs,
    reconnect: {
      enabled: user.reconnect?.enabled ?? defaults.reconnect.enabled,
      intervalMs: user.reconnect?.intervalMs ?? defaults.reconnect.intervalMs,
    },
    backlog: {
      enabled: user.backlog?.enabled ?? defaults.backlog.enabled,
      capacityBytes: user.backlog?.capacityBytes ?? defaults.backlog.capacityBytes,
      flushOn: user.backlog?.flushOn ?? defaults.backlog.flushOn,
      keepOpen: user.backlog?.keepOpen ?? defaults.backlog.keepOpen,
    },
    async: {
      enabled: user.async?.enabled ?? defaults.async.enabled,
      capacityBytes: user.async?.capacityBytes ?? defaults.async.capacityBytes,
      throttle: user.async?.throttle ?? defaults.async.throttle,
      clearOnDisconnect: user.async?.clearOnDisconnect ?? defaults.async.clearOnDisconnect,
    },
  };
}
