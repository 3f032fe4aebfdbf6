import { ProtocolError } from "../errors.js";

/** Little-endian reader over a complete frame. Truncation is a {@link ProtocolError}. */
export class BinaryReader {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });
  private offset = 0;

  constructor(input: Uint8Array) {
    // Plain view so slices are copies even when handed a Buffer.
    this.buffer = new Uint8Array(input.buffer, input.byteOffset, input.byteLength);
    this.view = new DataView(input.buffer, input.byteOffset, input.byteLength);
  }

  get remaining(): number {
    return this.buffer.byteLength - this.offset;
  }

  u8(field: string): number {
    this.require(1, field);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  i32(field: string): number {
    this.require(4, field);
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  u32(field: string): number {
    this.require(4, field);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  i64(field: string): number {
    this.require(8, field);
    const value = this.view.getBigInt64(this.offset, true);
    this.offset += 8;
    return Number(value);
  }

  string(field: string): string {
    const length = this.i32(`${field} length`);
    if (length < 0) throw new ProtocolError(`${field} has negative length ${length}`);
    return this.decode(length, field);
  }

  optionalString(field: string): string | undefined {
    const length = this.i32(`${field} length`);
    if (length === -1) return undefined;
    if (length < 0) throw new ProtocolError(`${field} has negative length ${length}`);
    return this.decode(length, field);
  }

  bytes(field: string): Uint8Array {
    const length = this.i32(`${field} length`);
    if (length < 0) throw new ProtocolError(`${field} has negative length ${length}`);
    this.require(length, field);
    const value = this.buffer.slice(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  map(field: string): Record<string, string> {
    const count = this.i32(`${field} count`);
    if (count < 0) throw new ProtocolError(`${field} has negative count ${count}`);
    const result: Record<string, string> = {};
    for (let i = 0; i < count; i++) {
      const key = this.string(`${field} key`);
      result[key] = this.string(`${field}[${key}]`);
    }
    return result;
  }

  private decode(length: number, field: string): string {
    this.require(length, field);
    const slice = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    try {
      return this.decoder.decode(slice);
    } catch (err) {
      throw new ProtocolError(`${field} is not valid UTF-8`, { cause: err });
    }
  }

  private require(count: number, field: string): void {
    if (this.offset + count > this.buffer.byteLength) {
      throw new ProtocolError(
        `Truncated frame: ${field} needs ${count} byte(s) at offset ${this.offset}, ${this.remaining} left`,
      );
    }
  }
}
