import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { ALL_LEVELS } from "../types/level.js";
import type { Packet } from "../types/packet.js";
import { decodePacket, encodePacket, MIN_FRAME_SIZE } from "./packet-codec.js";

const int32 = fc.integer({ min: -0x80000000, max: 0x7fffffff });
const text = fc.fullUnicodeString({ maxLength: 40 });
const key = fc.stringMatching(/^[a-z][a-z0-9._-]{0,11}$/);
const stringMap = fc.uniqueArray(fc.tuple(key, text), {
  maxLength: 5,
  selector: ([k]) => k,
}).map((entries) => Object.fromEntries(entries));

const common = fc.record(
  {
    level: fc.constantFrom(...ALL_LEVELS),
    timestamp: fc.maxSafeInteger(),
    sessionName: text,
    context: stringMap,
    correlationId: text,
    operationId: text,
    operationName: text,
    operationDepth: int32,
  },
  { requiredKeys: ["level", "timestamp", "sessionName", "context", "operationDepth"] },
);

const packet: fc.Arbitrary<Packet> = fc.oneof(
  fc
    .tuple(
      common,
      fc.record({
        entryType: int32,
        viewerId: int32,
        title: text,
        appName: text,
        hostName: text,
        processId: int32,
        threadId: int32,
        color: fc.integer({ min: 0, max: 0xffffffff }),
        data: fc.uint8Array({ maxLength: 64 }),
      }),
    )
    .map(([base, rest]): Packet => ({ ...base, ...rest, kind: "logEntry" })),
  fc
    .tuple(
      common,
      fc.record({ name: text, value: text, watchType: int32, group: text, labels: stringMap }),
    )
    .map(([base, rest]): Packet => ({ ...base, ...rest, kind: "watch" })),
  fc
    .tuple(
      common,
      fc.record({
        flowType: int32,
        title: text,
        hostName: text,
        processId: int32,
        threadId: int32,
      }),
    )
    .map(([base, rest]): Packet => ({ ...base, ...rest, kind: "processFlow" })),
  fc
    .tuple(common, fc.record({ commandType: int32, data: fc.uint8Array({ maxLength: 64 }) }))
    .map(([base, rest]): Packet => ({ ...base, ...rest, kind: "controlCommand" })),
  fc
    .tuple(
      common,
      fc.record({ channel: text, data: text, streamType: text, group: text }),
    )
    .map(([base, rest]): Packet => ({ ...base, ...rest, kind: "stream" })),
  fc
    .tuple(common, fc.record({ content: text }))
    .map(([base, rest]): Packet => ({ ...base, ...rest, kind: "logHeader" })),
);

describe("packet codec properties", () => {
  it("decode(encode(p)) equals p", () => {
    fc.assert(
      fc.property(packet, (p) => {
        expect(decodePacket(encodePacket(p))).toEqual(p);
      }),
    );
  });

  it("every frame is at least the minimum frame size and declares its own length", () => {
    fc.assert(
      fc.property(packet, (p) => {
        const frame = encodePacket(p);
        const declared = new DataView(frame.buffer, frame.byteOffset).getUint32(0, true);
        expect(frame.byteLength).toBeGreaterThanOrEqual(MIN_FRAME_SIZE);
        expect(declared).toBe(frame.byteLength - 4);
      }),
    );
  });
});
