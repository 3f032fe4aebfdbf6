/**
 * Wire codec for console packets.
 *
 * Frame layout (little-endian):
 * ```
 * u32 size | u8 tag | common fields | kind-specific fields
 * ```
 * `size` counts every byte after itself. Common fields are level, timestamp
 * (i64 microseconds), session name, correlation/operation ids, operation
 * depth and the context map. Encoding runs on the producer's call; decoding
 * exists for tests and tooling.
 * @module
 */

import { ProtocolError } from "../errors.js";
import { isLevel } from "../types/level.js";
import {
  type EncodedPacket,
  PACKET_TAGS,
  type Packet,
  type PacketKind,
} from "../types/packet.js";
import { BinaryReader } from "../utils/binary-reader.js";
import { BinaryWriter } from "../utils/binary-writer.js";

/** Bytes taken by the size header. */
export const FRAME_HEADER_SIZE = 4;

/** Smallest frame the codec can produce: a log header with every string empty. */
export const MIN_FRAME_SIZE = 42;

const KINDS_BY_TAG = new Map<number, PacketKind>(
  Object.entries(PACKET_TAGS).map(([kind, tag]) => [tag, kindOf(kind)]),
);

function kindOf(name: string): PacketKind {
  switch (name) {
    case "controlCommand":
    case "logEntry":
    case "watch":
    case "processFlow":
    case "logHeader":
    case "stream":
      return name;
    default:
      throw new ProtocolError(`Unknown packet kind "${name}"`);
  }
}

export function encodePacket(packet: Packet): Uint8Array {
  const writer = new BinaryWriter(128);
  writer.u32(0, "size");
  writer.u8(tagOf(packet), "tag");
  writer
    .u8(packet.level, "level")
    .i64(packet.timestamp, "timestamp")
    .string(packet.sessionName, "sessionName")
    .optionalString(packet.correlationId, "correlationId")
    .optionalString(packet.operationId, "operationId")
    .optionalString(packet.operationName, "operationName")
    .i32(packet.operationDepth, "operationDepth")
    .map(packet.context, "context");

  switch (packet.kind) {
    case "logEntry":
      writer
        .i32(packet.entryType, "entryType")
        .i32(packet.viewerId, "viewerId")
        .string(packet.title, "title")
        .string(packet.appName, "appName")
        .string(packet.hostName, "hostName")
        .i32(packet.processId, "processId")
        .i32(packet.threadId, "threadId")
        .u32(packet.color, "color")
        .bytes(packet.data, "data");
      break;
    case "watch":
      writer
        .string(packet.name, "name")
        .string(packet.value, "value")
        .i32(packet.watchType, "watchType")
        .string(packet.group, "group")
        .map(packet.labels, "labels");
      break;
    case "processFlow":
      writer
        .i32(packet.flowType, "flowType")
        .string(packet.title, "title")
        .string(packet.hostName, "hostName")
        .i32(packet.processId, "processId")
        .i32(packet.threadId, "threadId");
      break;
    case "controlCommand":
      writer.i32(packet.commandType, "commandType").bytes(packet.data, "data");
      break;
    case "stream":
      writer
        .string(packet.channel, "channel")
        .string(packet.data, "data")
        .string(packet.streamType, "streamType")
        .string(packet.group, "group");
      break;
    case "logHeader":
      writer.string(packet.content, "content");
      break;
  }

  writer.patchU32(0, writer.length - FRAME_HEADER_SIZE);
  return writer.toUint8Array();
}

export function toEncodedPacket(packet: Packet): EncodedPacket {
  return { packet, frame: encodePacket(packet) };
}

/** Decode exactly one frame. Trailing bytes are a {@link ProtocolError}. */
export function decodePacket(frame: Uint8Array): Packet {
  const reader = new BinaryReader(frame);
  const size = reader.u32("size");
  if (size !== reader.remaining) {
    throw new ProtocolError(`Frame size header says ${size} byte(s), frame carries ${reader.remaining}`);
  }

  const tag = reader.u8("tag");
  const kind = KINDS_BY_TAG.get(tag);
  if (!kind) throw new ProtocolError(`Unknown packet tag ${tag}`);

  const level = reader.u8("level");
  if (!isLevel(level)) throw new ProtocolError(`Unknown level ${level}`);

  const base = {
    level,
    timestamp: reader.i64("timestamp"),
    sessionName: reader.string("sessionName"),
    ...optional("correlationId", reader.optionalString("correlationId")),
    ...optional("operationId", reader.optionalString("operationId")),
    ...optional("operationName", reader.optionalString("operationName")),
    operationDepth: reader.i32("operationDepth"),
    context: Object.freeze(reader.map("context")),
  };

  let packet: Packet;
  switch (kind) {
    case "logEntry":
      packet = {
        ...base,
        kind,
        entryType: reader.i32("entryType"),
        viewerId: reader.i32("viewerId"),
        title: reader.string("title"),
        appName: reader.string("appName"),
        hostName: reader.string("hostName"),
        processId: reader.i32("processId"),
        threadId: reader.i32("threadId"),
        color: reader.u32("color"),
        data: reader.bytes("data"),
      };
      break;
    case "watch":
      packet = {
        ...base,
        kind,
        name: reader.string("name"),
        value: reader.string("value"),
        watchType: reader.i32("watchType"),
        group: reader.string("group"),
        labels: Object.freeze(reader.map("labels")),
      };
      break;
    case "processFlow":
      packet = {
        ...base,
        kind,
        flowType: reader.i32("flowType"),
        title: reader.string("title"),
        hostName: reader.string("hostName"),
        processId: reader.i32("processId"),
        threadId: reader.i32("threadId"),
      };
      break;
    case "controlCommand":
      packet = {
        ...base,
        kind,
        commandType: reader.i32("commandType"),
        data: reader.bytes("data"),
      };
      break;
    case "stream":
      packet = {
        ...base,
        kind,
        channel: reader.string("channel"),
        data: reader.string("data"),
        streamType: reader.string("streamType"),
        group: reader.string("group"),
      };
      break;
    case "logHeader":
      packet = { ...base, kind, content: reader.string("content") };
      break;
    default:
      throw new ProtocolError(`Unhandled packet kind ${String(kind)}`);
  }

  if (reader.remaining !== 0) {
    throw new ProtocolError(`${reader.remaining} trailing byte(s) after ${kind} packet`);
  }
  return Object.freeze(packet);
}

/** Split a byte stream holding back-to-back frames. Incomplete tails are an error. */
export function splitFrames(stream: Uint8Array): Uint8Array[] {
  const frames: Uint8Array[] = [];
  const view = new DataView(stream.buffer, stream.byteOffset, stream.byteLength);
  let offset = 0;
  while (offset < stream.byteLength) {
    if (offset + FRAME_HEADER_SIZE > stream.byteLength) {
      throw new ProtocolError(`Truncated frame header at offset ${offset}`);
    }
    const end = offset + FRAME_HEADER_SIZE + view.getUint32(offset, true);
    if (end > stream.byteLength) {
      throw new ProtocolError(`Truncated frame at offset ${offset}`);
    }
    frames.push(stream.subarray(offset, end));
    offset = end;
  }
  return frames;
}

function tagOf(packet: Packet): number {
  const tag: number | undefined = PACKET_TAGS[packet.kind];
  if (tag === undefined) throw new ProtocolError(`Unknown packet kind "${String(packet.kind)}"`);
  return tag;
}

function optional<K extends string>(
  key: K,
  value: string | undefined,
): { [P in K]?: string } {
  if (value === undefined) return {};
  const result: { [P in K]?: string } = {};
  result[key] = value;
  return result;
}
