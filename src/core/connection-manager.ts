/**
 * Owns the transport and the connection state machine.
 *
 * `disconnected → connecting → connected`, and back to `disconnected` on any
 * I/O failure. Reconnect attempts are time-gated: one may start only when
 * none has been made yet or at least `reconnect.intervalMs` has passed since
 * the previous attempt started. The manager never schedules attempts itself;
 * the Sender asks {@link ConnectionManager.canAttempt} and calls
 * {@link ConnectionManager.connect}.
 *
 * Observer callbacks are queued as microtasks so they never run inside the
 * caller's stack. State changes are emitted synchronously as `state` events.
 *
 * @module Connection
 */

import { ConnectionError, errorMessage, toConnectionError } from "../errors.js";
import type { ConnectionObserver } from "../interfaces/connection-observer.js";
import { noopObserver } from "../interfaces/connection-observer.js";
import type { HostResolver } from "../interfaces/host-resolver.js";
import type { Logger } from "../interfaces/logger.js";
import type { PacketTransport, TransportFactory } from "../interfaces/transport.js";
import type { ResolvedConnectionOptions } from "../types/config.js";
import { Level } from "../types/level.js";
import type { LogHeaderPacket } from "../types/packet.js";
import { noopLogger } from "../utils/noop-logger.js";
import { encodePacket } from "./packet-codec.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export type ConnectionState = "disconnected" | "connecting" | "connected";

export interface ConnectionEvents {
  state: { from: ConnectionState; to: ConnectionState };
}

export interface ConnectionManagerDeps {
  options: Pick<ResolvedConnectionOptions, "host" | "port" | "room" | "timeoutMs" | "reconnect">;
  transportFactory: TransportFactory;
  hostResolver: HostResolver;
  appName: string;
  hostName: string;
  observer?: ConnectionObserver;
  logger?: Logger;
  /** Milliseconds; defaults to Date.now. */
  now?: () => number;
}

export interface ConnectAttempt {
  /** First attempt of a pipeline; reported to observers as not a reconnect. */
  initial?: boolean;
}

export class ConnectionManager extends TypedEventEmitter<ConnectionEvents> {
  private transport: PacketTransport | null = null;
  private current: ConnectionState = "disconnected";
  private lastAttemptAt: number | undefined;
  private inflight: Promise<boolean> | null = null;
  /** Bumped by disconnect so a connect or write in flight knows it was cancelled. */
  private generation = 0;
  private terminated = false;
  private readonly observer: ConnectionObserver;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly deps: ConnectionManagerDeps) {
    super();
    this.observer = deps.observer ?? noopObserver;
    this.logger = deps.logger ?? noopLogger;
    this.now = deps.now ?? Date.now;
  }

  get state(): ConnectionState {
    return this.current;
  }

  get isConnected(): boolean {
    return this.current === "connected";
  }

  get isShutdown(): boolean {
    return this.terminated;
  }

  /** True iff no attempt was made yet or the interval since the last start has elapsed. */
  canAttempt(now: number = this.now()): boolean {
    if (this.terminated) return false;
    if (this.lastAttemptAt === undefined) return true;
    return now - this.lastAttemptAt >= this.deps.options.reconnect.intervalMs;
  }

  msUntilNextAttempt(now: number = this.now()): number {
    if (this.terminated) return Number.POSITIVE_INFINITY;
    if (this.lastAttemptAt === undefined) return 0;
    return Math.max(0, this.lastAttemptAt + this.deps.options.reconnect.intervalMs - now);
  }

  /**
   * Open a transport and send the log header. Resolves true when connected;
   * failures resolve false after notifying `onError`. Concurrent calls share
   * one attempt.
   */
  connect(attempt: ConnectAttempt = {}): Promise<boolean> {
    if (this.terminated) return Promise.resolve(false);
    if (this.current === "connected") return Promise.resolve(true);
    if (!this.inflight) {
      this.inflight = this.attempt(attempt.initial ?? false).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /**
   * Write `frames` as one burst. On failure the transport is dropped, the
   * state returns to disconnected and a {@link ConnectionError} is thrown.
   */
  async transmit(frames: readonly Uint8Array[]): Promise<void> {
    const transport = this.transport;
    if (!transport || this.current !== "connected") {
      throw new ConnectionError("Not connected");
    }
    if (frames.length === 0) return;

    const generation = this.generation;
    try {
      await transport.write(frames);
    } catch (err) {
      const error = toConnectionError(err, "Transmit failed");
      // A disconnect() during the write already tore the connection down
      if (generation === this.generation) {
        this.logger.warn(`Connection lost: ${error.message}`);
        this.dropTransport();
        this.notify((observer) => observer.onError(error));
      }
      throw error;
    }
  }

  /** Close the live connection. Safe while a transmit or connect is in flight. */
  disconnect(): void {
    this.generation++;
    this.dropTransport();
    if (this.current === "connecting") this.setState("disconnected");
  }

  /** Terminal: disconnect, refuse every later attempt and drop state listeners. */
  shutdown(): void {
    this.terminated = true;
    this.disconnect();
    this.removeAllListeners();
  }

  private async attempt(initial: boolean): Promise<boolean> {
    const generation = this.generation;
    const { host: configuredHost, port, timeoutMs } = this.deps.options;
    this.lastAttemptAt = this.now();
    this.setState("connecting");

    let host = configuredHost ?? "";
    let transport: PacketTransport | null = null;
    try {
      host = await this.deps.hostResolver.resolve(configuredHost);
      transport = await this.deps.transportFactory({ host, port, timeoutMs });
      if (generation !== this.generation) {
        transport.close();
        return false;
      }
      await transport.write([encodePacket(this.headerPacket())]);
    } catch (err) {
      transport?.close();
      if (generation !== this.generation) return false;
      const error = toConnectionError(err, `Connecting to ${host}:${port} failed`);
      this.logger.warn(error.message);
      this.setState("disconnected");
      this.notify((observer) => observer.onError(error));
      return false;
    }

    if (generation !== this.generation) {
      transport.close();
      return false;
    }

    this.transport = transport;
    this.setState("connected");
    const event = { reconnect: !initial, banner: transport.banner, host, port };
    this.logger.info(`Connected to ${host}:${port}`, { banner: transport.banner, reconnect: !initial });
    this.notify((observer) => observer.onConnect(event));
    return true;
  }

  private headerPacket(): LogHeaderPacket {
    const { appName, hostName, options } = this.deps;
    return {
      kind: "logHeader",
      level: Level.Control,
      timestamp: this.now() * 1000,
      sessionName: "",
      context: {},
      operationDepth: 0,
      content: `hostname=${hostName}\r\nappname=${appName}\r\nroom=${options.room}\r\n`,
    };
  }

  private dropTransport(): void {
    const transport = this.transport;
    if (!transport) return;
    this.transport = null;
    transport.close();
    this.setState("disconnected");
    this.notify((observer) => observer.onDisconnect());
  }

  private setState(next: ConnectionState): void {
    if (next === this.current) return;
    const from = this.current;
    this.current = next;
    this.emit("state", { from, to: next });
  }

  private notify(deliver: (observer: ConnectionObserver) => void): void {
    queueMicrotask(() => {
      try {
        deliver(this.observer);
      } catch (err) {
        this.logger.error(`Connection observer threw: ${errorMessage(err)}`, { error: err });
      }
    });
  }
}
