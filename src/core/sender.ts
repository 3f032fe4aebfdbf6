/**
 * The only component that performs transport I/O.
 *
 * In async mode one loop drains the dispatch queue; in sync mode a promise
 * chain serializes the callers' packets instead. Either way packets are
 * handled one at a time, in order:
 *
 * - connected: the backlog (if any) and the packet go out as one burst; a
 *   failed burst leaves the backlog intact and moves the packet into it.
 * - disconnected: the packet joins the backlog, then a reconnect is attempted
 *   if the time gate allows; a successful connect flushes the backlog as one
 *   burst. A flush-on packet that finds the gate closed arms a timer for the
 *   moment it opens.
 *
 * With `keepOpen` off the connection is opened only for flush bursts and
 * closed right after.
 *
 * @module Dispatch
 */

import { ConnectionError, errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { EncodedPacket } from "../types/packet.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { BacklogBuffer } from "./backlog-buffer.js";
import type { ConnectionManager } from "./connection-manager.js";
import type { DispatchQueue } from "./dispatch-queue.js";

export interface SenderDeps {
  connection: ConnectionManager;
  /** Present in async mode. */
  queue?: DispatchQueue;
  /** Absent when the backlog is disabled. */
  backlog?: BacklogBuffer;
  reconnect: boolean;
  keepOpen: boolean;
  logger?: Logger;
}

export interface SenderStats {
  sent: number;
  dropped: number;
}

export class Sender {
  private readonly logger: Logger;
  private readonly keepOpen: boolean;
  private loop: Promise<void> | null = null;
  private chain: Promise<void> = Promise.resolve();
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private attempted = false;
  private everConnected = false;
  private stopped = false;
  private sentCount = 0;
  private droppedCount = 0;

  constructor(private readonly deps: SenderDeps) {
    this.logger = deps.logger ?? noopLogger;
    // Without a backlog there is nothing to hold packets between bursts
    this.keepOpen = deps.keepOpen || !deps.backlog;
  }

  get stats(): SenderStats {
    return { sent: this.sentCount, dropped: this.droppedCount };
  }

  get flushTimerArmed(): boolean {
    return this.flushTimer !== null;
  }

  /** Start the background loop (async mode) and request the initial connect. */
  start(): void {
    const { queue } = this.deps;
    if (queue && !this.loop) this.loop = this.run(queue);
    this.wake();
  }

  /**
   * Handle `item` on the caller's turn (sync mode). Resolves once it was
   * transmitted, stored or dropped; transport faults never reject.
   */
  dispatch(item: EncodedPacket): Promise<void> {
    return this.enqueueWork(() => this.handle(item));
  }

  /** Run a step without a packet: reconnect and flush if due. */
  wake(): void {
    if (this.stopped) return;
    if (this.deps.queue) {
      this.deps.queue.wake();
    } else {
      this.enqueueWork(() => this.handle(undefined)).catch((err: unknown) => {
        this.logger.error(`Sender wake-up failed: ${errorMessage(err)}`, { error: err });
      });
    }
  }

  /**
   * Stop sending. With `flush`, queued packets are handled first and a last
   * connect is tried for a non-empty backlog; otherwise the queue is cleared.
   */
  async stop({ flush = true }: { flush?: boolean } = {}): Promise<void> {
    this.stopped = true;
    this.cancelFlushTimer();
    const { queue, backlog, connection } = this.deps;
    if (queue) {
      queue.close();
      if (!flush) queue.clear();
      await this.loop;
    } else {
      await this.chain;
    }
    if (flush && backlog && !backlog.isEmpty && !connection.isConnected && connection.canAttempt()) {
      await this.connectAndFlush();
    }
  }

  private async run(queue: DispatchQueue): Promise<void> {
    for (;;) {
      const take = await queue.next();
      if (take.type === "closed") return;
      try {
        await this.handle(take.type === "packet" ? take.item : undefined);
      } catch (err) {
        this.logger.error(`Sender failed: ${errorMessage(err)}`, { error: err });
      }
    }
  }

  private enqueueWork(work: () => Promise<void>): Promise<void> {
    const next = this.chain.then(work);
    // Keep the chain alive after a failed step; the caller sees the failure
    this.chain = next.catch((err: unknown) => {
      this.logger.error(`Sender failed: ${errorMessage(err)}`, { error: err });
    });
    return next;
  }

  private async handle(item: EncodedPacket | undefined): Promise<void> {
    const { connection, backlog } = this.deps;

    if (connection.isConnected && this.keepOpen) {
      const sent = await this.sendBurst(item);
      if (!sent && item) this.store(item);
      return;
    }

    if (item) {
      if (!backlog) {
        await this.sendWithoutBacklog(item);
        return;
      }
      if (this.keepOpen && !this.deps.reconnect && this.attempted) {
        this.drop(item, "reconnect disabled");
        return;
      }
      this.store(item);
    }

    if (this.wantsConnection() && connection.canAttempt()) {
      await this.connectAndFlush();
    } else if (backlog?.flushPending) {
      this.armFlushTimer();
    }
  }

  private async sendWithoutBacklog(item: EncodedPacket): Promise<void> {
    const { connection } = this.deps;
    if (!connection.isConnected && this.wantsConnection() && connection.canAttempt()) {
      await this.connectAndFlush();
    }
    if (!connection.isConnected || !(await this.sendBurst(item))) {
      this.drop(item, "not connected");
    }
  }

  /** Connect, then deliver the backlog as one burst. */
  private async connectAndFlush(): Promise<boolean> {
    const { connection } = this.deps;
    const initial = !this.everConnected;
    this.attempted = true;
    const connected = await connection.connect({ initial });
    if (!connected) {
      if (this.deps.backlog?.flushPending) this.armFlushTimer();
      return false;
    }
    this.everConnected = true;
    this.cancelFlushTimer();
    const flushed = await this.sendBurst(undefined);
    if (!this.keepOpen && connection.isConnected) connection.disconnect();
    return flushed;
  }

  /**
   * Write the backlog plus `item` as a single burst. Resolves false when the
   * connection failed; the backlog is then untouched.
   */
  private async sendBurst(item: EncodedPacket | undefined): Promise<boolean> {
    const { backlog, connection } = this.deps;
    const pending = backlog?.peekAll() ?? [];
    const burst = item ? [...pending, item] : pending;
    if (burst.length === 0) return true;

    try {
      await connection.transmit(burst.map((entry) => entry.frame));
    } catch (err) {
      if (!(err instanceof ConnectionError)) throw err;
      this.logger.debug?.(`Burst of ${burst.length} packet(s) not delivered: ${err.message}`);
      return false;
    }
    backlog?.discard(pending.length);
    this.sentCount += burst.length;
    return true;
  }

  private store(item: EncodedPacket): void {
    const { backlog } = this.deps;
    if (!backlog) {
      this.drop(item, "backlog disabled");
      return;
    }
    const result = backlog.append(item);
    if (result.flushRequested && this.mayReconnect()) this.armFlushTimer();
  }

  private drop(item: EncodedPacket, reason: string): void {
    this.droppedCount++;
    this.logger.debug?.(`Packet dropped: ${reason}`, { kind: item.packet.kind });
  }

  /** Whether this step should try to connect, gate permitting. */
  private wantsConnection(): boolean {
    if (this.deps.connection.isShutdown) return false;
    if (!this.keepOpen) return this.deps.backlog?.flushPending ?? false;
    return this.deps.reconnect || !this.attempted;
  }

  private mayReconnect(): boolean {
    if (this.deps.connection.isShutdown || this.stopped) return false;
    return !this.keepOpen || this.deps.reconnect;
  }

  private armFlushTimer(): void {
    if (this.flushTimer || !this.mayReconnect()) return;
    const delay = this.deps.connection.msUntilNextAttempt();
    if (!Number.isFinite(delay)) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.wake();
    }, delay);
    this.flushTimer.unref();
  }

  private cancelFlushTimer(): void {
    if (!this.flushTimer) return;
    clearTimeout(this.flushTimer);
    this.flushTimer = null;
  }
}
