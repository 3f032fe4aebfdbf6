/**
 * Holds encoded packets while the console is unreachable.
 *
 * Byte-budgeted ring: appending past the budget evicts oldest-first, never
 * the newcomer. A packet at or above `flushOn` marks the backlog as due for a
 * flush, which the Sender turns into a reconnect attempt and a single burst.
 * Removal after a burst is explicit ({@link BacklogBuffer.discard}) so a burst
 * that fails leaves every packet in place.
 *
 * @module Dispatch
 */

import type { Logger } from "../interfaces/logger.js";
import type { Level } from "../types/level.js";
import { type EncodedPacket, packetSize } from "../types/packet.js";
import { noopLogger } from "../utils/noop-logger.js";
import { RingBuffer } from "../utils/ring-buffer.js";
import { MIN_FRAME_SIZE } from "./packet-codec.js";

export interface BacklogBufferOptions {
  capacityBytes: number;
  flushOn: Level;
  logger?: Logger;
}

export interface BacklogAppendResult {
  /** False when the packet alone exceeds the capacity. */
  accepted: boolean;
  /** The appended packet reached the flush-on level. */
  flushRequested: boolean;
  /** Packets evicted to make room. */
  evicted: number;
}

export class BacklogBuffer {
  private readonly ring: RingBuffer<EncodedPacket>;
  private readonly logger: Logger;
  private pendingFlush = false;
  private droppedCount = 0;

  constructor(private readonly options: BacklogBufferOptions) {
    this.ring = new RingBuffer(
      options.capacityBytes,
      Math.floor(options.capacityBytes / MIN_FRAME_SIZE) + 1,
      packetSize,
    );
    this.logger = options.logger ?? noopLogger;
  }

  get capacity(): number {
    return this.options.capacityBytes;
  }

  get count(): number {
    return this.ring.size;
  }

  get bytes(): number {
    return this.ring.bytes;
  }

  get isEmpty(): boolean {
    return this.ring.isEmpty;
  }

  /** A flush-on packet arrived and has not been delivered yet. */
  get flushPending(): boolean {
    return this.pendingFlush;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  append(item: EncodedPacket): BacklogAppendResult {
    if (!this.ring.canEverFit(item)) {
      this.droppedCount++;
      this.logger.warn(
        `Packet of ${packetSize(item)} bytes exceeds backlog capacity of ${this.capacity} bytes; dropped`,
        { kind: item.packet.kind },
      );
      return { accepted: false, flushRequested: false, evicted: 0 };
    }

    const evicted = this.ring.evictFor(item).length;
    if (evicted > 0) {
      this.droppedCount += evicted;
      this.logger.debug?.(`Backlog full; evicted ${evicted} oldest packet(s)`);
    }
    this.ring.push(item);

    const flushRequested = item.packet.level >= this.options.flushOn;
    if (flushRequested) this.pendingFlush = true;
    return { accepted: true, flushRequested, evicted };
  }

  /** Every resident packet, oldest first. The backlog is left untouched. */
  peekAll(): EncodedPacket[] {
    return this.ring.toArray();
  }

  /** Remove the `n` oldest packets after they were delivered. */
  discard(n: number): number {
    const removed = this.ring.discard(n);
    if (this.ring.isEmpty) this.pendingFlush = false;
    return removed;
  }

  clear(): number {
    const dropped = this.ring.clear();
    this.droppedCount += dropped;
    this.pendingFlush = false;
    return dropped;
  }
}
