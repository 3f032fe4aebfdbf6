/**
 * Byte-budgeted FIFO between producers and the Sender.
 *
 * Producers enqueue encoded packets; the single consumer takes them with
 * {@link DispatchQueue.next}. When an item does not fit, the overflow policy
 * decides: `throttle` parks the producer (FIFO among parked producers) until
 * the consumer frees space, `drop` evicts the oldest residents. Resident bytes
 * never exceed the capacity.
 *
 * @module Dispatch
 */

import { QueueOverflowError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { type EncodedPacket, packetSize } from "../types/packet.js";
import { noopLogger } from "../utils/noop-logger.js";
import { RingBuffer } from "../utils/ring-buffer.js";
import { MIN_FRAME_SIZE } from "./packet-codec.js";

export type QueueTake =
  | { type: "packet"; item: EncodedPacket }
  | { type: "wake" }
  | { type: "closed" };

export interface DispatchQueueOptions {
  capacityBytes: number;
  /** Park producers instead of evicting when the queue is full. */
  throttle: boolean;
  logger?: Logger;
}

interface ParkedProducer {
  item: EncodedPacket;
  admit: () => void;
}

export class DispatchQueue {
  private readonly ring: RingBuffer<EncodedPacket>;
  private readonly parked: ParkedProducer[] = [];
  private readonly logger: Logger;
  private consumer: ((take: QueueTake) => void) | null = null;
  private wakePending = false;
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly options: DispatchQueueOptions) {
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

  /** Producers parked under the throttle policy. */
  get waiting(): number {
    return this.parked.length;
  }

  /** Packets dropped by eviction, oversize, clear or submission after close. */
  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Admit `item`. Resolves immediately unless the throttle policy parks the
   * caller, in which case it resolves once the item is resident (or dropped
   * by a clear after close). Never rejects.
   */
  enqueue(item: EncodedPacket): Promise<void> {
    if (!this.acceptable(item)) return Promise.resolve();

    if (!this.options.throttle) {
      this.evictFor(item);
      this.admit(item);
      return Promise.resolve();
    }

    if (this.parked.length === 0 && this.ring.fits(item)) {
      this.admit(item);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.parked.push({ item, admit: resolve });
    });
  }

  /**
   * Non-blocking variant of {@link enqueue}. Returns false when the item was
   * dropped. Under throttle a full queue throws {@link QueueOverflowError}.
   */
  tryEnqueue(item: EncodedPacket): boolean {
    if (!this.acceptable(item)) return false;

    if (this.options.throttle) {
      if (this.parked.length > 0 || !this.ring.fits(item)) {
        throw new QueueOverflowError(
          `Dispatch queue full (${this.ring.bytes}/${this.capacity} bytes, ${this.parked.length} waiting)`,
        );
      }
    } else {
      this.evictFor(item);
    }
    this.admit(item);
    return true;
  }

  /**
   * Take the next event for the consumer: the oldest packet, a pending wake,
   * or `closed` once the queue is closed and empty. One caller at a time.
   */
  next(): Promise<QueueTake> {
    if (this.consumer) throw new Error("DispatchQueue supports a single consumer");
    const take = this.poll();
    if (take) return Promise.resolve(take);
    return new Promise<QueueTake>((resolve) => {
      this.consumer = resolve;
    });
  }

  /** Interrupt a waiting consumer with a `wake` take. */
  wake(): void {
    this.wakePending = true;
    this.deliver();
  }

  /**
   * Drop every resident packet and return how many were dropped. Parked
   * producers move in as space allows; after {@link close} they are dropped
   * too.
   */
  clear(): number {
    let dropped = this.ring.clear();
    if (this.closed) {
      for (const producer of this.parked.splice(0)) {
        producer.admit();
        dropped++;
      }
    } else {
      this.admitParked();
    }
    this.droppedCount += dropped;
    if (dropped > 0) this.logger.debug?.(`Dispatch queue cleared ${dropped} packet(s)`);
    return dropped;
  }

  /** Refuse new items. The consumer drains what is left, then sees `closed`. */
  close(): void {
    this.closed = true;
    this.deliver();
  }

  private acceptable(item: EncodedPacket): boolean {
    if (this.closed) {
      this.droppedCount++;
      this.logger.debug?.("Dispatch queue closed; packet dropped", { kind: item.packet.kind });
      return false;
    }
    if (!this.ring.canEverFit(item)) {
      this.droppedCount++;
      this.logger.warn(
        `Packet of ${packetSize(item)} bytes exceeds dispatch queue capacity of ${this.capacity} bytes; dropped`,
        { kind: item.packet.kind },
      );
      return false;
    }
    return true;
  }

  private evictFor(item: EncodedPacket): void {
    const evicted = this.ring.evictFor(item).length;
    if (evicted > 0) {
      this.droppedCount += evicted;
      this.logger.debug?.(`Dispatch queue full; evicted ${evicted} oldest packet(s)`);
    }
  }

  private admit(item: EncodedPacket): void {
    this.ring.push(item);
    this.deliver();
  }

  private admitParked(): void {
    while (this.parked.length > 0) {
      const head = this.parked[0];
      if (!head || !this.ring.fits(head.item)) break;
      this.parked.shift();
      this.ring.push(head.item);
      head.admit();
    }
  }

  private poll(): QueueTake | undefined {
    const item = this.ring.shift();
    if (item) {
      this.admitParked();
      return { type: "packet", item };
    }
    if (this.wakePending) {
      this.wakePending = false;
      return { type: "wake" };
    }
    if (this.closed && this.parked.length === 0) return { type: "closed" };
    return undefined;
  }

  private deliver(): void {
    if (!this.consumer) return;
    const take = this.poll();
    if (!take) return;
    const resolve = this.consumer;
    this.consumer = null;
    resolve(take);
  }
}
