/**
 * Entry point of the library.
 *
 * Owns the variable store, the context propagator and the sessions, and
 * builds one pipeline per {@link LogshipClient.connect}: dispatch queue
 * (async mode), backlog, connection manager and sender. Producers encode
 * their packet on their own turn and hand it to the queue, or in sync mode
 * to the sender directly.
 *
 * @module Client
 */

import { hostname } from "node:os";
import { WslHostResolver } from "../adapters/host-resolver.js";
import { connectTcp } from "../adapters/tcp-transport.js";
import { readConfigurationFile } from "../config/config-file.js";
import { parseConnectionString } from "../config/connection-string.js";
import { VariableStore } from "../config/variable-store.js";
import { ConfigurationError, errorMessage, LogshipError } from "../errors.js";
import { type ConnectionObserver, toObserver } from "../interfaces/connection-observer.js";
import type { HostResolver } from "../interfaces/host-resolver.js";
import type { Logger } from "../interfaces/logger.js";
import type { TransportFactory } from "../interfaces/transport.js";
import {
  type ConnectionOptions,
  DEFAULT_CONNECTION_OPTIONS,
  type ResolvedConnectionOptions,
  resolveConnectionOptions,
} from "../types/config.js";
import { Level, parseLevel } from "../types/level.js";
import type { Packet } from "../types/packet.js";
import { noopLogger } from "../utils/noop-logger.js";
import { BacklogBuffer } from "./backlog-buffer.js";
import { ConnectionManager, type ConnectionState } from "./connection-manager.js";
import { ContextPropagator } from "./context-propagator.js";
import { DispatchQueue } from "./dispatch-queue.js";
import type { AdmissionState } from "./level-filter.js";
import { toEncodedPacket } from "./packet-codec.js";
import { Sender } from "./sender.js";
import { Session, type SessionHost } from "./session.js";

export const MAIN_SESSION = "Main";

export interface LogshipClientOptions {
  appName?: string;
  /** Defaults to the OS hostname. */
  hostName?: string;
  logger?: Logger;
  observer?: Partial<ConnectionObserver>;
  transportFactory?: TransportFactory;
  hostResolver?: HostResolver;
  /** Fallback for `${name}` / `%name%` placeholders; defaults to process.env. */
  env?: Readonly<Record<string, string | undefined>>;
  /** Milliseconds since the epoch; defaults to Date.now. */
  clock?: () => number;
}

export interface BufferStats {
  count: number;
  bytes: number;
  dropped: number;
}

export interface ClientStats {
  state: ConnectionState;
  queue: BufferStats;
  backlog: BufferStats;
  /** Packets written to the console. */
  sent: number;
  /** Packets the sender discarded: no backlog, or reconnect disabled. */
  dropped: number;
}

export interface ShutdownOptions {
  /** Deliver what is queued before closing. Default true. */
  flush?: boolean;
}

interface Pipeline {
  readonly options: ResolvedConnectionOptions;
  readonly connection: ConnectionManager;
  readonly queue?: DispatchQueue;
  readonly backlog?: BacklogBuffer;
  readonly sender: Sender;
}

const EMPTY_STATS: BufferStats = Object.freeze({ count: 0, bytes: 0, dropped: 0 });

export class LogshipClient implements SessionHost, AdmissionState {
  appName: string;
  hostName: string;
  defaultLevel: Level = Level.Message;
  readonly variables: VariableStore;
  readonly context = new ContextPropagator();

  private clientLevel: Level = Level.Debug;
  private isEnabled = false;
  private terminated = false;
  private pipeline: Pipeline | null = null;
  private savedOptions: ResolvedConnectionOptions | undefined;
  private readonly sessions = new Map<string, Session>();
  private readonly retiring = new Set<Promise<void>>();
  private readonly logger: Logger;
  private readonly observer: ConnectionObserver;
  private readonly transportFactory: TransportFactory;
  private readonly hostResolver: HostResolver;
  private readonly clock: () => number;

  constructor(options: LogshipClientOptions = {}) {
    this.appName = options.appName ?? "Node App";
    this.hostName = options.hostName ?? hostname();
    this.logger = options.logger ?? noopLogger;
    this.observer = toObserver(options.observer);
    this.transportFactory = options.transportFactory ?? connectTcp;
    this.hostResolver = options.hostResolver ?? new WslHostResolver(this.logger);
    this.variables = new VariableStore(options.env);
    this.clock = options.clock ?? Date.now;
    this.sessions.set(MAIN_SESSION, new Session(MAIN_SESSION, this));
  }

  // ── Admission ──

  get enabled(): boolean {
    return this.isEnabled;
  }

  /**
   * Enabling reconnects with the last options when no pipeline is running;
   * disabling stops the pipeline after delivering what it holds.
   */
  set enabled(value: boolean) {
    if (value === this.isEnabled) return;
    if (value) {
      if (!this.pipeline && this.savedOptions) this.connect(this.savedOptions);
      else this.isEnabled = true;
      return;
    }
    this.isEnabled = false;
    this.retireCurrent();
  }

  /** Client-wide threshold, applied on top of each session's. */
  get level(): Level {
    return this.clientLevel;
  }

  setLevel(level: Level | string): void {
    const parsed = parseLevel(level);
    if (parsed === undefined) throw new ConfigurationError(`Unknown level "${level}"`);
    this.clientLevel = parsed;
  }

  get admission(): AdmissionState {
    return this;
  }

  // ── Sessions ──

  get main(): Session {
    return this.getSession(MAIN_SESSION);
  }

  /** The session called `name`, created on first use. */
  getSession(name: string): Session {
    let session = this.sessions.get(name);
    if (!session) {
      session = new Session(name, this);
      this.sessions.set(name, session);
    }
    return session;
  }

  /** Forget a session. The main session cannot be deleted. */
  deleteSession(name: string): boolean {
    if (name === MAIN_SESSION) return false;
    return this.sessions.delete(name);
  }

  // ── Pipeline ──

  get state(): ConnectionState {
    return this.pipeline?.connection.state ?? "disconnected";
  }

  /** Options of the running pipeline, or of the last connect. */
  get connectionOptions(): ResolvedConnectionOptions | undefined {
    return this.pipeline?.options ?? this.savedOptions;
  }

  /**
   * Validate `target` and start a pipeline for it; the first connection
   * attempt runs in the background. A descriptor is expanded against the
   * variable store first. Throws {@link ConfigurationError} for anything
   * malformed. A running pipeline is replaced.
   */
  connect(target?: string | ConnectionOptions): void {
    if (this.terminated) throw new LogshipError("Client has been shut down", "SHUTDOWN");
    const options = this.resolveTarget(target);

    this.retireCurrent();
    this.savedOptions = options;
    this.pipeline = this.createPipeline(options);
    this.isEnabled = true;
    this.pipeline.sender.start();
    this.logger.info(`Pipeline started for ${options.host ?? "local console"}:${options.port}`, {
      async: options.async.enabled,
      backlog: options.backlog.enabled,
    });
  }

  /**
   * Hand `packet` to the pipeline. Resolves once accepted; under the
   * throttle policy that waits for queue space. Packets are dropped while
   * the client is disabled. Throws ProtocolError for packets the wire format
   * cannot carry.
   */
  async submit(packet: Packet): Promise<void> {
    const pipeline = this.pipeline;
    if (!this.isEnabled || !pipeline) return;
    const item = toEncodedPacket(packet);
    if (pipeline.queue) await pipeline.queue.enqueue(item);
    else await pipeline.sender.dispatch(item);
  }

  /**
   * Non-blocking {@link submit}. Returns false when the packet was not taken;
   * a full throttled queue throws QueueOverflowError.
   */
  trySubmit(packet: Packet): boolean {
    const pipeline = this.pipeline;
    if (!this.isEnabled || !pipeline) return false;
    const item = toEncodedPacket(packet);
    if (pipeline.queue) return pipeline.queue.tryEnqueue(item);
    pipeline.sender.dispatch(item).catch((err: unknown) => {
      this.logger.error(`Dispatch failed: ${errorMessage(err)}`, { error: err });
    });
    return true;
  }

  timestamp(): number {
    return this.clock() * 1000;
  }

  stats(): ClientStats {
    const pipeline = this.pipeline;
    const queue = pipeline?.queue;
    const backlog = pipeline?.backlog;
    const sender = pipeline?.sender.stats ?? { sent: 0, dropped: 0 };
    return {
      state: this.state,
      queue: queue ? { count: queue.count, bytes: queue.bytes, dropped: queue.dropped } : EMPTY_STATS,
      backlog: backlog
        ? { count: backlog.count, bytes: backlog.bytes, dropped: backlog.dropped }
        : EMPTY_STATS,
      sent: sender.sent,
      dropped: sender.dropped,
    };
  }

  /**
   * Apply a `key = value` configuration file. A missing file changes
   * nothing. With `connections` set: `enabled = true` connects, `enabled =
   * false` disables, and without `enabled` the options are only stored for a
   * later {@link connect} or `enabled = true`.
   */
  loadConfiguration(path: string): void {
    const config = readConfigurationFile(path);
    if (!config) return;

    if (config.appName !== undefined) this.appName = config.appName;
    if (config.level !== undefined) this.clientLevel = config.level;
    if (config.defaultLevel !== undefined) this.defaultLevel = config.defaultLevel;
    if (config.connections === undefined) return;

    const options = this.resolveTarget(config.connections);
    if (config.enabled === true) {
      this.connect(options);
      return;
    }
    if (config.enabled === false) this.enabled = false;
    this.savedOptions = options;
  }

  /** Stop the pipeline after delivering what it holds and disable the client. */
  async disconnect(): Promise<void> {
    this.isEnabled = false;
    this.retireCurrent();
    await this.settle();
  }

  /**
   * Terminal. Stops the pipeline, with or without delivering what is queued,
   * and drops every session but the main one.
   */
  async shutdown({ flush = true }: ShutdownOptions = {}): Promise<void> {
    this.terminated = true;
    this.isEnabled = false;
    this.retireCurrent({ flush });
    await this.settle();
    for (const name of [...this.sessions.keys()]) this.deleteSession(name);
  }

  private resolveTarget(target: string | ConnectionOptions | undefined): ResolvedConnectionOptions {
    if (target === undefined) return this.savedOptions ?? DEFAULT_CONNECTION_OPTIONS;
    if (typeof target === "string") {
      return resolveConnectionOptions(parseConnectionString(this.variables.expand(target)));
    }
    return resolveConnectionOptions(target);
  }

  private createPipeline(options: ResolvedConnectionOptions): Pipeline {
    const logger = this.logger;
    const connection = new ConnectionManager({
      options,
      transportFactory: this.transportFactory,
      hostResolver: this.hostResolver,
      appName: this.appName,
      hostName: this.hostName,
      observer: this.observer,
      logger,
      now: this.clock,
    });
    const queue = options.async.enabled
      ? new DispatchQueue({
          capacityBytes: options.async.capacityBytes,
          throttle: options.async.throttle,
          logger,
        })
      : undefined;
    const backlog = options.backlog.enabled
      ? new BacklogBuffer({
          capacityBytes: options.backlog.capacityBytes,
          flushOn: options.backlog.flushOn,
          logger,
        })
      : undefined;
    const sender = new Sender({
      connection,
      queue,
      backlog,
      reconnect: options.reconnect.enabled,
      keepOpen: options.backlog.keepOpen,
      logger,
    });

    if (queue && options.async.clearOnDisconnect) {
      connection.on("state", ({ from, to }) => {
        if (from === "connected" && to === "disconnected") queue.clear();
      });
    }
    return { options, connection, queue, backlog, sender };
  }

  private retireCurrent({ flush = true }: ShutdownOptions = {}): void {
    const pipeline = this.pipeline;
    if (!pipeline) return;
    this.pipeline = null;

    const stopping: Promise<void> = pipeline.sender
      .stop({ flush })
      .catch((err: unknown) => {
        this.logger.error(`Stopping pipeline failed: ${errorMessage(err)}`, { error: err });
      })
      .finally(() => {
        pipeline.connection.shutdown();
        this.retiring.delete(stopping);
      });
    this.retiring.add(stopping);
  }

  private async settle(): Promise<void> {
    await Promise.all([...this.retiring]);
  }
}
