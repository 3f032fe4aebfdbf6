/**
 * A named logging channel with its own level threshold.
 *
 * Every operation checks admission first; message fragments, lazy thunks,
 * JSON serialization, binary copies and counter/checkpoint/timer updates only
 * happen for admitted packets. Operations resolve once the pipeline accepted
 * the packets (immediately unless the dispatch queue throttles) and never
 * reject for transport faults.
 *
 * @module Sessions
 */

import { threadId } from "node:worker_threads";
import { type CallerLevel, Level } from "../types/level.js";
import {
  type ContextMap,
  type ControlCommandPacket,
  ControlCommandType,
  DEFAULT_COLOR,
  type LogEntryPacket,
  LogEntryType,
  type Packet,
  type ProcessFlowPacket,
  ProcessFlowType,
  type SourceId,
  type StreamPacket,
  ViewerId,
  type WatchPacket,
  WatchType,
} from "../types/packet.js";
import type { CapturedContext, ContextPropagator, Tags } from "./context-propagator.js";
import { type AdmissionState, sessionAdmits } from "./level-filter.js";

export type FragmentValue = string | number | boolean | bigint | null | undefined | Error;

/** A message piece; thunks are evaluated only when the packet is admitted. */
export type MessageFragment = FragmentValue | (() => FragmentValue);

export type WatchValue = string | number | boolean | bigint | Date | null | undefined | object;

/** What a session needs from the client that owns it. */
export interface SessionHost {
  readonly appName: string;
  readonly hostName: string;
  readonly defaultLevel: Level;
  readonly admission: AdmissionState;
  readonly context: ContextPropagator;
  /** Microseconds since the Unix epoch. */
  timestamp(): number;
  submit(packet: Packet): Promise<void>;
}

const MAIN_THREAD = "Main Thread";

const ENTRY_TYPES: Record<CallerLevel, LogEntryType> = {
  [Level.Debug]: LogEntryType.Debug,
  [Level.Verbose]: LogEntryType.Verbose,
  [Level.Message]: LogEntryType.Message,
  [Level.Warning]: LogEntryType.Warning,
  [Level.Error]: LogEntryType.Error,
  [Level.Fatal]: LogEntryType.Fatal,
};

const encoder = new TextEncoder();

export class Session {
  /** Session threshold; the client-wide level applies as well. */
  level: Level = Level.Debug;
  active = true;
  color: number = DEFAULT_COLOR;

  private checkpointCounter = 0;
  private readonly checkpoints = new Map<string, number>();
  private readonly counters = new Map<string, number>();
  private readonly timers = new Map<string, number>();

  constructor(
    readonly name: string,
    private readonly host: SessionHost,
  ) {}

  /** Whether a packet at `level` would be sent. Without a level: whether the session is on at all. */
  isOn(level?: Level): boolean {
    if (!this.active || !this.host.admission.enabled) return false;
    if (level === undefined) return true;
    return sessionAdmits(this.host.admission, this.level, level);
  }

  // ── Messages ──

  log(level: CallerLevel, ...fragments: MessageFragment[]): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    return this.sendEntry(level, formatFragments(fragments), ENTRY_TYPES[level]);
  }

  logDebug(...fragments: MessageFragment[]): Promise<void> {
    return this.log(Level.Debug, ...fragments);
  }

  logVerbose(...fragments: MessageFragment[]): Promise<void> {
    return this.log(Level.Verbose, ...fragments);
  }

  logMessage(...fragments: MessageFragment[]): Promise<void> {
    return this.log(Level.Message, ...fragments);
  }

  logWarning(...fragments: MessageFragment[]): Promise<void> {
    return this.log(Level.Warning, ...fragments);
  }

  logError(...fragments: MessageFragment[]): Promise<void> {
    return this.log(Level.Error, ...fragments);
  }

  logFatal(...fragments: MessageFragment[]): Promise<void> {
    return this.log(Level.Fatal, ...fragments);
  }

  /** Log with extra context tags that win over every scope tag. */
  logTagged(level: CallerLevel, tags: Tags, ...fragments: MessageFragment[]): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    return this.sendEntry(level, formatFragments(fragments), ENTRY_TYPES[level], { tags });
  }

  logSeparator(level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    return this.sendEntry(level, "", LogEntryType.Separator);
  }

  resetCallstack(level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    return this.sendEntry(level, "", LogEntryType.ResetCallstack);
  }

  /** Error entry titled with the message; the stack trace travels as data. */
  logException(error: unknown, title?: string): Promise<void> {
    if (!this.isOn(Level.Error)) return Promise.resolve();
    const err = error instanceof Error ? error : new Error(String(error));
    const trace = err.stack ?? `${err.name}: ${err.message}`;
    return this.sendEntry(Level.Error, title ?? (err.message || "Error"), LogEntryType.Error, {
      viewerId: ViewerId.Data,
      data: encoder.encode(trace),
    });
  }

  /** Logs an assert entry only when `condition` is false. */
  logAssert(condition: boolean, ...fragments: MessageFragment[]): Promise<void> {
    if (!this.isOn(Level.Error) || condition) return Promise.resolve();
    return this.sendEntry(Level.Error, formatFragments(fragments), LogEntryType.Assert);
  }

  logConditional(condition: boolean, ...fragments: MessageFragment[]): Promise<void> {
    const level = this.host.defaultLevel;
    if (!this.isOn(level) || !condition) return Promise.resolve();
    return this.sendEntry(level, formatFragments(fragments), LogEntryType.Conditional);
  }

  // ── Values and payloads ──

  logValue(name: string, value: WatchValue, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    return this.sendEntry(level, `${name} = ${formatValue(value)}`, LogEntryType.VariableValue);
  }

  logText(title: string, text: string, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    return this.sendEntry(level, title, LogEntryType.Text, {
      viewerId: ViewerId.Data,
      data: encoder.encode(text),
    });
  }

  /**
   * Pretty-printed JSON as a source entry. A string is parsed first so it is
   * re-indented; one that is not JSON is sent as is.
   */
  logJson(title: string, value: unknown, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    const resolved: unknown = typeof value === "function" ? value() : value;
    return this.sendSource(level, title, toJson(resolved), ViewerId.JavaScriptSource);
  }

  logBinary(title: string, bytes: Uint8Array | string, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    const data = typeof bytes === "string" ? encoder.encode(bytes) : Uint8Array.from(bytes);
    return this.sendEntry(level, title, LogEntryType.Binary, { viewerId: ViewerId.Binary, data });
  }

  logSource(
    title: string,
    code: string,
    sourceId: SourceId,
    level: Level = this.host.defaultLevel,
  ): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    return this.sendSource(level, title, code, sourceId);
  }

  // ── Watches and metrics ──

  /** Watch a value; the watch type follows the value's runtime type. */
  watch(
    name: string,
    value: WatchValue,
    group = "",
    level: Level = this.host.defaultLevel,
  ): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    const [text, watchType] = inferWatch(value);
    return this.sendWatch(level, name, text, watchType, group, {});
  }

  watchWithLabels(
    name: string,
    value: WatchValue,
    labels: Readonly<Record<string, string>>,
    level: Level = this.host.defaultLevel,
  ): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    const [text, watchType] = inferWatch(value);
    return this.sendWatch(level, name, text, watchType, "", labels);
  }

  metric(name: string): MetricBuilder {
    return new MetricBuilder(this, name);
  }

  incCounter(name: string, level: Level = this.host.defaultLevel): Promise<void> {
    return this.stepCounter(name, 1, level);
  }

  decCounter(name: string, level: Level = this.host.defaultLevel): Promise<void> {
    return this.stepCounter(name, -1, level);
  }

  resetCounter(name: string): void {
    this.counters.delete(name);
  }

  /** `Checkpoint #n` without a name; `name #n (details)` per named checkpoint. */
  addCheckpoint(name?: string, details?: string, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    let title: string;
    if (name) {
      const count = (this.checkpoints.get(name) ?? 0) + 1;
      this.checkpoints.set(name, count);
      title = details ? `${name} #${count} (${details})` : `${name} #${count}`;
    } else {
      this.checkpointCounter++;
      title = `Checkpoint #${this.checkpointCounter}`;
    }
    return this.sendEntry(level, title, LogEntryType.Checkpoint);
  }

  resetCheckpoint(name?: string): void {
    if (name) this.checkpoints.delete(name);
    else this.checkpointCounter = 0;
  }

  timeStart(name: string, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    this.timers.set(name, performance.now());
    return this.sendEntry(level, `Timer "${name}" started`, ENTRY_TYPES[callerLevel(level)]);
  }

  /** Watch the elapsed milliseconds and log them. An unknown timer logs a warning. */
  async timeEnd(name: string, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return;
    const start = this.timers.get(name);
    if (start === undefined) {
      await this.logWarning(`Timer "${name}" not found`);
      return;
    }
    this.timers.delete(name);
    const elapsed = performance.now() - start;
    await this.sendWatch(level, name, String(elapsed), WatchType.Float, "", {});
    await this.sendEntry(level, `Timer "${name}": ${elapsed.toFixed(3)}ms`, ENTRY_TYPES[callerLevel(level)]);
  }

  // ── Process flow ──

  async enterMethod(name: string, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return;
    await this.sendEntry(level, name, LogEntryType.EnterMethod);
    await this.sendFlow(level, name, ProcessFlowType.EnterMethod);
  }

  async leaveMethod(name: string, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return;
    await this.sendEntry(level, name, LogEntryType.LeaveMethod);
    await this.sendFlow(level, name, ProcessFlowType.LeaveMethod);
  }

  /** Enter `name`, run `fn`, and leave again however `fn` finishes. */
  async trackMethod<T>(
    name: string,
    fn: () => T | Promise<T>,
    level: Level = this.host.defaultLevel,
  ): Promise<T> {
    await this.enterMethod(name, level);
    try {
      return await fn();
    } finally {
      await this.leaveMethod(name, level);
    }
  }

  enterThread(name = MAIN_THREAD, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    return this.sendFlow(level, name, ProcessFlowType.EnterThread);
  }

  leaveThread(name = MAIN_THREAD, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    return this.sendFlow(level, name, ProcessFlowType.LeaveThread);
  }

  async enterProcess(name = this.host.appName, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return;
    await this.sendFlow(level, name, ProcessFlowType.EnterProcess);
    await this.sendFlow(level, MAIN_THREAD, ProcessFlowType.EnterThread);
  }

  async leaveProcess(name = this.host.appName, level: Level = this.host.defaultLevel): Promise<void> {
    if (!this.isOn(level)) return;
    await this.sendFlow(level, MAIN_THREAD, ProcessFlowType.LeaveThread);
    await this.sendFlow(level, name, ProcessFlowType.LeaveProcess);
  }

  // ── Streams ──

  /** Send `data` on a stream channel; non-string data is sent as JSON. */
  logStream(
    channel: string,
    data: unknown,
    streamType = "",
    group = "",
    level: Level = this.host.defaultLevel,
  ): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    const packet: StreamPacket = {
      kind: "stream",
      ...this.common(level),
      channel,
      data: typeof data === "string" ? data : toJsonLine(data),
      streamType,
      group,
    };
    return this.host.submit(Object.freeze(packet));
  }

  // ── Console control ──

  clearLog(): Promise<void> {
    return this.sendControl(ControlCommandType.ClearLog);
  }

  clearWatches(): Promise<void> {
    return this.sendControl(ControlCommandType.ClearWatches);
  }

  clearAutoViews(): Promise<void> {
    return this.sendControl(ControlCommandType.ClearAutoViews);
  }

  clearAll(): Promise<void> {
    return this.sendControl(ControlCommandType.ClearAll);
  }

  clearProcessFlow(): Promise<void> {
    return this.sendControl(ControlCommandType.ClearProcessFlow);
  }

  // ── Packet construction ──

  private common(level: Level, tags?: Tags): CapturedContext & {
    level: Level;
    timestamp: number;
    sessionName: string;
  } {
    return {
      level,
      timestamp: this.host.timestamp(),
      sessionName: this.name,
      ...this.host.context.capture(tags),
    };
  }

  private sendEntry(
    level: Level,
    title: string,
    entryType: LogEntryType,
    extra: { viewerId?: ViewerId; data?: Uint8Array; tags?: Tags } = {},
  ): Promise<void> {
    const packet: LogEntryPacket = {
      kind: "logEntry",
      ...this.common(level, extra.tags),
      entryType,
      viewerId: extra.viewerId ?? ViewerId.Title,
      title,
      appName: this.host.appName,
      hostName: this.host.hostName,
      processId: process.pid,
      threadId,
      color: this.color,
      data: extra.data ?? new Uint8Array(0),
    };
    return this.host.submit(Object.freeze(packet));
  }

  private sendSource(level: Level, title: string, code: string, sourceId: SourceId): Promise<void> {
    return this.sendEntry(level, title, LogEntryType.Source, {
      viewerId: sourceId,
      data: encoder.encode(code),
    });
  }

  private sendWatch(
    level: Level,
    name: string,
    value: string,
    watchType: WatchType,
    group: string,
    labels: ContextMap,
  ): Promise<void> {
    const packet: WatchPacket = {
      kind: "watch",
      ...this.common(level),
      name,
      value,
      watchType,
      group,
      labels: Object.freeze({ ...labels }),
    };
    return this.host.submit(Object.freeze(packet));
  }

  private sendFlow(level: Level, title: string, flowType: ProcessFlowType): Promise<void> {
    const packet: ProcessFlowPacket = {
      kind: "processFlow",
      ...this.common(level),
      flowType,
      title,
      hostName: this.host.hostName,
      processId: process.pid,
      threadId,
    };
    return this.host.submit(Object.freeze(packet));
  }

  private sendControl(commandType: ControlCommandType): Promise<void> {
    if (!this.isOn()) return Promise.resolve();
    const packet: ControlCommandPacket = {
      kind: "controlCommand",
      ...this.common(Level.Control),
      commandType,
      data: new Uint8Array(0),
    };
    return this.host.submit(Object.freeze(packet));
  }

  private stepCounter(name: string, delta: number, level: Level): Promise<void> {
    if (!this.isOn(level)) return Promise.resolve();
    const value = (this.counters.get(name) ?? 0) + delta;
    this.counters.set(name, value);
    return this.sendWatch(level, name, String(value), WatchType.Integer, "", {});
  }
}

/** Fluent builder for a labelled watch. */
export class MetricBuilder {
  private readonly labels: Record<string, string> = {};
  private level: Level | undefined;

  constructor(
    private readonly session: Session,
    private readonly name: string,
  ) {}

  withLabel(key: string, value: string | number | boolean | null | undefined): this {
    this.labels[key] = value === null || value === undefined ? "" : String(value);
    return this;
  }

  forInstance(instance: string): this {
    return this.withLabel("instance", instance);
  }

  withLevel(level: Level): this {
    this.level = level;
    return this;
  }

  set(value: WatchValue): Promise<void> {
    if (this.level === undefined) return this.session.watchWithLabels(this.name, value, this.labels);
    return this.session.watchWithLabels(this.name, value, this.labels, this.level);
  }
}

// ── Formatting ──

export function formatFragments(fragments: readonly MessageFragment[]): string {
  return fragments
    .map((fragment) => formatFragment(typeof fragment === "function" ? fragment() : fragment))
    .join(" ");
}

function formatFragment(value: FragmentValue): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  return String(value);
}

function formatValue(value: WatchValue): string {
  if (typeof value === "string") return `"${value}"`;
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === "object") return toJsonLine(value);
  return String(value);
}

function inferWatch(value: WatchValue): [string, WatchType] {
  switch (typeof value) {
    case "string":
      return [value, WatchType.String];
    case "boolean":
      return [String(value), WatchType.Boolean];
    case "bigint":
      return [String(value), WatchType.Integer];
    case "number":
      return [String(value), Number.isInteger(value) ? WatchType.Integer : WatchType.Float];
  }
  if (value instanceof Date) return [value.toISOString(), WatchType.Timestamp];
  if (value === null || value === undefined) return [String(value), WatchType.Object];
  return [toJsonLine(value), WatchType.Object];
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

function toJsonLine(value: unknown): string {
  return JSON.stringify(value, bigintReplacer) ?? String(value);
}

function toJson(value: unknown): string {
  let parsed = value;
  if (typeof value === "string") {
    try {
      parsed = JSON.parse(value);
    } catch {
      return value;
    }
  }
  return JSON.stringify(parsed, bigintReplacer, 2) ?? String(parsed);
}

/** Entry type for timer messages sent at a control level. */
function callerLevel(level: Level): CallerLevel {
  return level === Level.Control ? Level.Message : level;
}
