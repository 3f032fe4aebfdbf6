import { ProtocolError } from "../errors.js";

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;
const UINT32_MAX = 0xffffffff;

/**
 * Growable little-endian byte writer used by the packet codec.
 *
 * Every numeric write validates its input and throws {@link ProtocolError}
 * naming the offending field, so a bad packet fails before any byte of it
 * reaches a queue.
 */
export class BinaryWriter {
  private buffer: Buffer;
  private offset = 0;

  constructor(initialSize = 256) {
    this.buffer = Buffer.allocUnsafe(initialSize);
  }

  get length(): number {
    return this.offset;
  }

  u8(value: number, field: string): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new ProtocolError(`${field} must be an unsigned 8-bit integer, got ${value}`);
    }
    this.ensure(1);
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
    return this;
  }

  i32(value: number, field: string): this {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new ProtocolError(`${field} must be a signed 32-bit integer, got ${value}`);
    }
    this.ensure(4);
    this.buffer.writeInt32LE(value, this.offset);
    this.offset += 4;
    return this;
  }

  u32(value: number, field: string): this {
    if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
      throw new ProtocolError(`${field} must be an unsigned 32-bit integer, got ${value}`);
    }
    this.ensure(4);
    this.buffer.writeUInt32LE(value, this.offset);
    this.offset += 4;
    return this;
  }

  i64(value: number, field: string): this {
    if (!Number.isSafeInteger(value)) {
      throw new ProtocolError(`${field} must be a safe integer, got ${value}`);
    }
    this.ensure(8);
    this.buffer.writeBigInt64LE(BigInt(value), this.offset);
    this.offset += 8;
    return this;
  }

  string(value: string, field: string): this {
    if (typeof value !== "string") {
      throw new ProtocolError(`${field} must be a string`);
    }
    const byteLength = Buffer.byteLength(value, "utf8");
    this.i32(byteLength, `${field} length`);
    this.ensure(byteLength);
    this.buffer.write(value, this.offset, byteLength, "utf8");
    this.offset += byteLength;
    return this;
  }

  /** Absent values are written as length -1. */
  optionalString(value: string | undefined, field: string): this {
    if (value === undefined) return this.i32(-1, `${field} length`);
    return this.string(value, field);
  }

  bytes(value: Uint8Array, field: string): this {
    if (!(value instanceof Uint8Array)) {
      throw new ProtocolError(`${field} must be a Uint8Array`);
    }
    this.i32(value.byteLength, `${field} length`);
    this.ensure(value.byteLength);
    this.buffer.set(value, this.offset);
    this.offset += value.byteLength;
    return this;
  }

  map(value: Readonly<Record<string, string>>, field: string): this {
    const entries = Object.entries(value);
    this.i32(entries.length, `${field} count`);
    for (const [key, entry] of entries) {
      this.string(key, `${field} key`);
      this.string(entry, `${field}[${key}]`);
    }
    return this;
  }

  /** Overwrite a previously reserved u32 slot (frame size header). */
  patchU32(at: number, value: number): this {
    this.buffer.writeUInt32LE(value, at);
    return this;
  }

  /** Copy of the written bytes as a plain Uint8Array. */
  toUint8Array(): Uint8Array {
    return new Uint8Array(this.buffer.subarray(0, this.offset));
  }

  private ensure(extra: number): void {
    const required = this.offset + extra;
    if (required <= this.buffer.length) return;
    let size = Math.max(this.buffer.length * 2, 64);
    while (size < required) size *= 2;
    const next = Buffer.allocUnsafe(size);
    this.buffer.copy(next, 0, 0, this.offset);
    this.buffer = next;
  }
}
