/**
 * Byte transport to the logging console. Only what the connection manager uses.
 * @module
 */

/** An open, handshaken connection. */
export interface PacketTransport {
  /** Banner line the console sent during the handshake. */
  readonly banner: string;
  /**
   * Write the frames as one burst and resolve once the console has
   * acknowledged every one of them. Rejects with a ConnectionError.
   */
  write(frames: readonly Uint8Array[]): Promise<void>;
  /** Tear the connection down. Pending writes reject. Idempotent. */
  close(): void;
}

export interface TransportConnectOptions {
  host: string;
  port: number;
  timeoutMs: number;
}

/** Opens a transport or rejects with a ConnectionError. */
export type TransportFactory = (options: TransportConnectOptions) => Promise<PacketTransport>;
