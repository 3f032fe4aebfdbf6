/**
 * Scoped tags and correlation ids for packets.
 *
 * Two independent stacks live in AsyncLocalStorage, so a frame follows the
 * logical async flow that entered it (awaits, timers, promise callbacks)
 * rather than whichever code happens to run next. Frames are immutable
 * arrays; entering a scope runs the callback with a longer array and the
 * previous one is back in effect when the callback returns, throws, or its
 * promise settles.
 *
 * @module Context
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import type { ContextMap } from "../types/packet.js";

export type TagValue = string | number | boolean | bigint | null | undefined;
export type Tags = Readonly<Record<string, TagValue>>;

interface CorrelationFrame {
  readonly correlationId: string;
  readonly operationId?: string;
  readonly operationName?: string;
  readonly depth: number;
}

export interface CorrelationSnapshot {
  readonly correlationId?: string;
  readonly operationId?: string;
  readonly operationName?: string;
  readonly operationDepth: number;
}

/** Everything a packet takes from its creation context. Frozen. */
export interface CapturedContext extends CorrelationSnapshot {
  readonly context: ContextMap;
}

export interface CorrelationOptions {
  correlationId?: string;
  operationName?: string;
}

const EMPTY_TAGS: readonly ContextMap[] = Object.freeze([]);

export class ContextPropagator {
  private readonly tagStack = new AsyncLocalStorage<readonly ContextMap[]>();
  private readonly correlationStack = new AsyncLocalStorage<readonly CorrelationFrame[]>();

  constructor(private readonly newId: () => string = randomUUID) {}

  /** Run `fn` with an extra tag frame. Inner frames override outer ones. */
  withTags<T>(tags: Tags, fn: () => T): T {
    const frame = normalizeTags(tags);
    return this.tagStack.run([...this.tagFrames(), frame], fn);
  }

  /** Run `fn` inside a fresh correlation (new id unless given). */
  withCorrelation<T>(fn: () => T, options: CorrelationOptions = {}): T {
    const frame: CorrelationFrame = Object.freeze({
      correlationId: options.correlationId ?? this.newId(),
      operationName: options.operationName,
      depth: 0,
    });
    return this.correlationStack.run([...this.correlationFrames(), frame], fn);
  }

  /**
   * Run `fn` as a named operation one level below the current one. Outside
   * any correlation a new correlation id is started.
   */
  withOperation<T>(name: string, fn: () => T): T {
    const parent = this.correlationFrames().at(-1);
    const frame: CorrelationFrame = Object.freeze({
      correlationId: parent?.correlationId ?? this.newId(),
      operationId: this.newId(),
      operationName: name,
      depth: (parent?.depth ?? 0) + 1,
    });
    return this.correlationStack.run([...this.correlationFrames(), frame], fn);
  }

  /** Tags of all active frames folded outer to inner. */
  currentTags(): Record<string, string> {
    const merged: Record<string, string> = {};
    for (const frame of this.tagFrames()) Object.assign(merged, frame);
    return merged;
  }

  currentCorrelation(): CorrelationSnapshot {
    const frame = this.correlationFrames().at(-1);
    if (!frame) return { operationDepth: 0 };
    return {
      correlationId: frame.correlationId,
      ...(frame.operationId !== undefined && { operationId: frame.operationId }),
      ...(frame.operationName !== undefined && { operationName: frame.operationName }),
      operationDepth: frame.depth,
    };
  }

  /**
   * Snapshot the effective context for a packet being created now. Inline
   * tags win over every scope frame.
   */
  capture(inline?: Tags): CapturedContext {
    const context = this.currentTags();
    if (inline) Object.assign(context, normalizeTags(inline));
    return Object.freeze({ ...this.currentCorrelation(), context: Object.freeze(context) });
  }

  /** Fluent builder for a tag frame. */
  build(): ContextBuilder {
    return new ContextBuilder(this);
  }

  private tagFrames(): readonly ContextMap[] {
    return this.tagStack.getStore() ?? EMPTY_TAGS;
  }

  private correlationFrames(): readonly CorrelationFrame[] {
    return this.correlationStack.getStore() ?? [];
  }
}

export class ContextBuilder {
  private readonly tags: Record<string, TagValue> = {};

  constructor(private readonly propagator: ContextPropagator) {}

  with(key: string, value: TagValue): this {
    this.tags[key] = value;
    return this;
  }

  run<T>(fn: () => T): T {
    return this.propagator.withTags({ ...this.tags }, fn);
  }
}

/** Stringify tag values, skipping null and undefined. */
export function normalizeTags(tags: Tags): ContextMap {
  const frame: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags)) {
    if (value === null || value === undefined) continue;
    frame[key] = String(value);
  }
  return Object.freeze(frame);
}
