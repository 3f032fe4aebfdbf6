/**
 * Packet taxonomy for the console wire protocol.
 *
 * Packets are plain immutable records discriminated on `kind`. Numeric
 * enums below are wire values and must not be renumbered.
 * @module
 */

import type { Level } from "./level.js";

export const PACKET_TAGS = {
  controlCommand: 1,
  logEntry: 4,
  watch: 5,
  processFlow: 6,
  logHeader: 7,
  stream: 8,
} as const;

export type PacketKind = keyof typeof PACKET_TAGS;

export enum LogEntryType {
  Separator = 0,
  EnterMethod = 1,
  LeaveMethod = 2,
  ResetCallstack = 3,
  Message = 100,
  Warning = 101,
  Error = 102,
  InternalError = 103,
  Comment = 104,
  VariableValue = 105,
  Checkpoint = 106,
  Debug = 107,
  Verbose = 108,
  Fatal = 109,
  Conditional = 110,
  Assert = 111,
  Text = 200,
  Binary = 201,
  Graphic = 202,
  Source = 203,
  Object = 204,
  WebContent = 205,
  System = 206,
  MemoryStatistic = 207,
  DatabaseResult = 208,
  DatabaseStructure = 209,
}

export enum ViewerId {
  None = -1,
  Title = 0,
  Data = 1,
  List = 2,
  ValueList = 3,
  Inspector = 4,
  Table = 5,
  Web = 100,
  Binary = 200,
  HtmlSource = 300,
  JavaScriptSource = 301,
  VbScriptSource = 302,
  PerlSource = 303,
  SqlSource = 304,
  IniSource = 305,
  PythonSource = 306,
  XmlSource = 307,
  Bitmap = 400,
  Jpeg = 401,
  Icon = 402,
  Metafile = 403,
}

/** Viewer ids that select source highlighting in the console. */
export type SourceId =
  | ViewerId.HtmlSource
  | ViewerId.JavaScriptSource
  | ViewerId.VbScriptSource
  | ViewerId.PerlSource
  | ViewerId.SqlSource
  | ViewerId.IniSource
  | ViewerId.PythonSource
  | ViewerId.XmlSource;

export enum WatchType {
  Char = 0,
  String = 1,
  Integer = 2,
  Float = 3,
  Boolean = 4,
  Address = 5,
  Timestamp = 6,
  Object = 7,
}

export enum ControlCommandType {
  ClearLog = 0,
  ClearWatches = 1,
  ClearAutoViews = 2,
  ClearAll = 3,
  ClearProcessFlow = 4,
}

export enum ProcessFlowType {
  EnterMethod = 0,
  LeaveMethod = 1,
  EnterThread = 2,
  LeaveThread = 3,
  EnterProcess = 4,
  LeaveProcess = 5,
}

/** Tells the console to paint the row with its theme color. */
export const DEFAULT_COLOR = 0xff000005;

export type ContextMap = Readonly<Record<string, string>>;

interface PacketBase {
  readonly level: Level;
  /** Microseconds since the Unix epoch. */
  readonly timestamp: number;
  readonly sessionName: string;
  readonly context: ContextMap;
  readonly correlationId?: string;
  readonly operationId?: string;
  readonly operationName?: string;
  readonly operationDepth: number;
}

export interface LogEntryPacket extends PacketBase {
  readonly kind: "logEntry";
  readonly entryType: LogEntryType;
  readonly viewerId: ViewerId;
  readonly title: string;
  readonly appName: string;
  readonly hostName: string;
  readonly processId: number;
  readonly threadId: number;
  readonly color: number;
  readonly data: Uint8Array;
}

export interface WatchPacket extends PacketBase {
  readonly kind: "watch";
  readonly name: string;
  readonly value: string;
  readonly watchType: WatchType;
  readonly group: string;
  readonly labels: ContextMap;
}

export interface ProcessFlowPacket extends PacketBase {
  readonly kind: "processFlow";
  readonly flowType: ProcessFlowType;
  readonly title: string;
  readonly hostName: string;
  readonly processId: number;
  readonly threadId: number;
}

export interface ControlCommandPacket extends PacketBase {
  readonly kind: "controlCommand";
  readonly commandType: ControlCommandType;
  readonly data: Uint8Array;
}

export interface StreamPacket extends PacketBase {
  readonly kind: "stream";
  readonly channel: string;
  readonly data: string;
  readonly streamType: string;
  readonly group: string;
}

/** Connection preamble; built by the transport, never by callers. */
export interface LogHeaderPacket extends PacketBase {
  readonly kind: "logHeader";
  readonly content: string;
}

export type Packet =
  | LogEntryPacket
  | WatchPacket
  | ProcessFlowPacket
  | ControlCommandPacket
  | StreamPacket
  | LogHeaderPacket;

/** A packet together with its wire frame; the unit held by queue and backlog. */
export interface EncodedPacket {
  readonly packet: Packet;
  readonly frame: Uint8Array;
}

export function packetSize(item: EncodedPacket): number {
  return item.frame.byteLength;
}
