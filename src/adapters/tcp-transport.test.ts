import { createServer, type Server, type Socket } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { decodePacket, encodePacket } from "../core/packet-codec.js";
import { ConnectionError } from "../errors.js";
import { makeLogEntry } from "../testing/packets.js";
import { ACK_SIZE, CLIENT_BANNER, TcpTransport } from "./tcp-transport.js";

// ---------------------------------------------------------------------------
// In-process console stand-in
// ---------------------------------------------------------------------------

interface FakeConsole {
  server: Server;
  port: number;
  clientBanners: string[];
  frames: Uint8Array[];
  sockets: Socket[];
}

interface FakeConsoleBehavior {
  banner?: string | null;
  /** Stop acknowledging after this many frames. */
  ackLimit?: number;
}

async function startConsole(behavior: FakeConsoleBehavior = {}): Promise<FakeConsole> {
  const state: Omit<FakeConsole, "server" | "port"> = { clientBanners: [], frames: [], sockets: [] };
  const server = createServer((socket) => {
    state.sockets.push(socket);
    socket.on("error", () => socket.destroy());
    if (behavior.banner !== null) socket.write(behavior.banner ?? "Test Console v1.0\n");

    let buffered = Buffer.alloc(0);
    let handshaken = false;
    socket.on("data", (chunk: Buffer) => {
      buffered = Buffer.concat([buffered, chunk]);
      if (!handshaken) {
        const newline = buffered.indexOf(0x0a);
        if (newline === -1) return;
        state.clientBanners.push(buffered.subarray(0, newline + 1).toString("utf-8"));
        buffered = buffered.subarray(newline + 1);
        handshaken = true;
      }
      while (buffered.length >= 4) {
        const end = 4 + buffered.readUInt32LE(0);
        if (buffered.length < end) break;
        state.frames.push(new Uint8Array(buffered.subarray(0, end)));
        buffered = buffered.subarray(end);
        if (behavior.ackLimit === undefined || state.frames.length <= behavior.ackLimit) {
          socket.write(Buffer.alloc(ACK_SIZE));
        }
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Expected a TCP address");
  return { ...state, server, port: address.port };
}

async function stopConsole(fake: FakeConsole): Promise<void> {
  for (const socket of fake.sockets) socket.destroy();
  await new Promise<void>((resolve) => fake.server.close(() => resolve()));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("TcpTransport", () => {
  let fake: FakeConsole | undefined;
  let transport: TcpTransport | undefined;

  afterEach(async () => {
    transport?.close();
    transport = undefined;
    if (fake) await stopConsole(fake);
    fake = undefined;
  });

  it("exchanges banners during the handshake", async () => {
    fake = await startConsole();
    transport = await TcpTransport.connect({ host: "127.0.0.1", port: fake.port, timeoutMs: 2000 });

    expect(transport.banner).toBe("Test Console v1.0");
    await transport.write([encodePacket(makeLogEntry({ title: "sync" }))]);
    expect(fake.clientBanners).toEqual([CLIENT_BANNER]);
    expect(CLIENT_BANNER).toMatch(/^logship v\S+\n$/);
  });

  it("writes a burst and resolves once every frame is acknowledged", async () => {
    fake = await startConsole();
    transport = await TcpTransport.connect({ host: "127.0.0.1", port: fake.port, timeoutMs: 2000 });

    const frames = ["p1", "p2", "p3"].map((title) => encodePacket(makeLogEntry({ title })));
    await transport.write(frames);

    expect(fake.frames.map((frame) => decodePacket(frame))).toMatchObject([
      { title: "p1" },
      { title: "p2" },
      { title: "p3" },
    ]);
  });

  it("rejects with ConnectionError when nothing listens", async () => {
    const probe = await startConsole();
    const port = probe.port;
    await stopConsole(probe);

    await expect(
      TcpTransport.connect({ host: "127.0.0.1", port, timeoutMs: 2000 }),
    ).rejects.toBeInstanceOf(ConnectionError);
  });

  it("times out when the console never sends its banner", async () => {
    fake = await startConsole({ banner: null });
    await expect(
      TcpTransport.connect({ host: "127.0.0.1", port: fake.port, timeoutMs: 50 }),
    ).rejects.toThrow("Timed out after 50 ms waiting for the console");
  });

  it("times out when acknowledgements stop", async () => {
    fake = await startConsole({ ackLimit: 0 });
    transport = await TcpTransport.connect({ host: "127.0.0.1", port: fake.port, timeoutMs: 50 });

    await expect(transport.write([encodePacket(makeLogEntry())])).rejects.toThrow(ConnectionError);
    await expect(transport.write([encodePacket(makeLogEntry())])).rejects.toThrow(
      "Transport is closed",
    );
  });

  it("fails a write after the console drops the connection", async () => {
    fake = await startConsole();
    const peer = fake;
    transport = await TcpTransport.connect({ host: "127.0.0.1", port: peer.port, timeoutMs: 2000 });
    await transport.write([encodePacket(makeLogEntry())]);

    const closed = new Promise<void>((resolve) => {
      const socket = peer.sockets[0];
      if (!socket) throw new Error("No server-side socket");
      socket.once("close", () => resolve());
      socket.destroy();
    });
    await closed;
    await new Promise((resolve) => setTimeout(resolve, 20));

    await expect(transport.write([encodePacket(makeLogEntry())])).rejects.toBeInstanceOf(
      ConnectionError,
    );
  });

  it("close is idempotent and fails later writes", async () => {
    fake = await startConsole();
    transport = await TcpTransport.connect({ host: "127.0.0.1", port: fake.port, timeoutMs: 2000 });
    transport.close();
    transport.close();
    await expect(transport.write([new Uint8Array(4)])).rejects.toThrow("Transport is closed");
  });
});
