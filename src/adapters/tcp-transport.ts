/**
 * TCP transport to the logging console over node:net.
 *
 * Handshake: the console sends a banner line, the client answers with its
 * own. After that every frame written is acknowledged by the console with
 * {@link ACK_SIZE} bytes; a write resolves once all acknowledgements for its
 * frames have arrived. The socket timeout is armed only while the client
 * waits for the console, so an idle connection stays open.
 * @module
 */

import { createConnection, type Socket } from "node:net";
import { ConnectionError, toConnectionError } from "../errors.js";
import type {
  PacketTransport,
  TransportConnectOptions,
  TransportFactory,
} from "../interfaces/transport.js";
import { resolvePackageVersion } from "../utils/resolve-package-version.js";

export const ACK_SIZE = 2;

const version = resolvePackageVersion(import.meta.url, ["../../package.json", "../package.json"]);

export const CLIENT_BANNER = `logship v${version}\n`;

interface PendingRead {
  /** Resolve the read if enough data is buffered. */
  tryComplete(): boolean;
  reject(error: ConnectionError): void;
}

/** Buffers inbound bytes and serves one pending read at a time. */
class SocketReader {
  private buffered: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private failure: ConnectionError | null = null;
  private connected = false;

  constructor(socket: Socket) {
    socket.on("connect", () => {
      this.connected = true;
      this.check();
    });
    socket.on("data", (chunk: Buffer) => {
      this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);
      this.check();
    });
    socket.on("error", (err) => this.fail(toConnectionError(err, "Socket error")));
    socket.on("close", () => this.fail(new ConnectionError("Console closed the connection")));
  }

  waitConnected(): Promise<true> {
    return this.take(() => (this.connected ? true : undefined));
  }

  readLine(): Promise<string> {
    return this.take(() => {
      const newline = this.buffered.indexOf(0x0a);
      if (newline === -1) return undefined;
      const line = this.buffered.subarray(0, newline + 1).toString("utf-8");
      this.buffered = this.buffered.subarray(newline + 1);
      return line;
    });
  }

  readExactly(count: number): Promise<Buffer> {
    return this.take(() => {
      if (this.buffered.length < count) return undefined;
      const bytes = this.buffered.subarray(0, count);
      this.buffered = this.buffered.subarray(count);
      return bytes;
    });
  }

  fail(error: ConnectionError): void {
    if (this.failure) return;
    this.failure = error;
    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);
  }

  private take<T>(extract: () => T | undefined): Promise<T> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.pending) return Promise.reject(new ConnectionError("Concurrent read on transport"));
    const ready = extract();
    if (ready !== undefined) return Promise.resolve(ready);
    return new Promise<T>((resolve, reject) => {
      this.pending = {
        tryComplete: () => {
          const value = extract();
          if (value === undefined) return false;
          resolve(value);
          return true;
        },
        reject,
      };
    });
  }

  private check(): void {
    if (this.pending?.tryComplete()) this.pending = null;
  }
}

export class TcpTransport implements PacketTransport {
  private closed = false;
  private writing = false;

  private constructor(
    private readonly socket: Socket,
    private readonly reader: SocketReader,
    private readonly timeoutMs: number,
    readonly banner: string,
  ) {}

  static async connect(
    options: TransportConnectOptions,
    clientBanner: string = CLIENT_BANNER,
  ): Promise<TcpTransport> {
    const { host, port, timeoutMs } = options;
    const socket = createConnection({ host, port });
    const reader = new SocketReader(socket);
    socket.setNoDelay(true);
    socket.setTimeout(timeoutMs);
    socket.on("timeout", () => {
      reader.fail(new ConnectionError(`Timed out after ${timeoutMs} ms waiting for the console`));
      socket.destroy();
    });

    try {
      await reader.waitConnected();
      const banner = await reader.readLine();
      await write(socket, Buffer.from(clientBanner, "utf-8"));
      socket.setTimeout(0);
      socket.setKeepAlive(true);
      return new TcpTransport(socket, reader, timeoutMs, banner.trim());
    } catch (err) {
      socket.destroy();
      throw toConnectionError(err, `Connecting to ${host}:${port} failed`);
    }
  }

  async write(frames: readonly Uint8Array[]): Promise<void> {
    if (this.closed) throw new ConnectionError("Transport is closed");
    if (this.writing) throw new ConnectionError("Transport write already in progress");
    if (frames.length === 0) return;

    this.writing = true;
    this.socket.setTimeout(this.timeoutMs);
    try {
      await write(this.socket, Buffer.concat(frames));
      await this.reader.readExactly(ACK_SIZE * frames.length);
    } catch (err) {
      this.close();
      throw toConnectionError(err, "Write to console failed");
    } finally {
      this.writing = false;
      if (!this.closed) this.socket.setTimeout(0);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.reader.fail(new ConnectionError("Transport closed"));
    this.socket.destroy();
  }
}

function write(socket: Socket, bytes: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(bytes, (err) => (err ? reject(err) : resolve()));
  });
}

/** Default {@link TransportFactory}: a handshaken TCP connection. */
export const connectTcp: TransportFactory = (options) => TcpTransport.connect(options);
