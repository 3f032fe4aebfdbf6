import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { HostResolver } from "../interfaces/host-resolver.js";
import { MockConsole } from "../testing/mock-transport.js";
import { encodedEntry } from "../testing/packets.js";
import { DEFAULT_CONNECTION_OPTIONS } from "../types/config.js";
import { Level } from "../types/level.js";
import { BacklogBuffer } from "./backlog-buffer.js";
import { ConnectionManager } from "./connection-manager.js";
import { DispatchQueue } from "./dispatch-queue.js";
import { Sender } from "./sender.js";

const passthroughResolver: HostResolver = {
  resolve: async (host) => host ?? "127.0.0.1",
};

interface Harness {
  sender: Sender;
  connection: ConnectionManager;
  backlog: BacklogBuffer | undefined;
  queue: DispatchQueue | undefined;
}

interface HarnessOptions {
  now?: () => number;
  reconnect?: boolean;
  keepOpen?: boolean;
  backlog?: boolean;
  async?: boolean;
}

function createHarness(peer: MockConsole, options: HarnessOptions = {}): Harness {
  const reconnect = options.reconnect ?? true;
  const connection = new ConnectionManager({
    options: {
      ...DEFAULT_CONNECTION_OPTIONS,
      reconnect: { enabled: reconnect, intervalMs: 3000 },
    },
    transportFactory: peer.factory,
    hostResolver: passthroughResolver,
    appName: "test-app",
    hostName: "test-host",
    now: options.now,
  });
  const backlog =
    options.backlog === false
      ? undefined
      : new BacklogBuffer({ capacityBytes: 64 * 1024, flushOn: Level.Error });
  const queue = options.async
    ? new DispatchQueue({ capacityBytes: 64 * 1024, throttle: false })
    : undefined;
  const sender = new Sender({
    connection,
    backlog,
    queue,
    reconnect,
    keepOpen: options.keepOpen ?? true,
  });
  return { sender, connection, backlog, queue };
}

describe("Sender", () => {
  let peer: MockConsole;
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    peer = new MockConsole();
    clock = 0;
  });

  describe("sync mode", () => {
    it("connects on start and sends packets live", async () => {
      const { sender } = createHarness(peer, { now });
      sender.start();
      await sender.dispatch(encodedEntry("a"));
      await sender.dispatch(encodedEntry("b"));

      expect(peer.connects).toHaveLength(1);
      expect(peer.packetBursts.map((burst) => burst.length)).toEqual([1, 1]);
      expect(peer.titles).toEqual(["a", "b"]);
      expect(sender.stats).toEqual({ sent: 2, dropped: 0 });
    });

    it("replays the backlog before later packets after a reconnect", async () => {
      peer.reachable = false;
      const { sender, backlog } = createHarness(peer, { now });
      sender.start();
      for (const title of ["p1", "p2", "p3", "p4", "p5"]) {
        await sender.dispatch(encodedEntry(title));
      }
      expect(backlog?.count).toBe(5);
      expect(peer.connects).toHaveLength(1);

      peer.reachable = true;
      clock = 3000;
      sender.wake();
      await sender.dispatch(encodedEntry("p6"));

      expect(peer.titles).toEqual(["p1", "p2", "p3", "p4", "p5", "p6"]);
      expect(peer.packetBursts.map((burst) => burst.length)).toEqual([5, 1]);
      expect(backlog?.isEmpty).toBe(true);
    });

    it("sends a packet that arrives when the gate opens in the same burst as the backlog", async () => {
      peer.reachable = false;
      const { sender } = createHarness(peer, { now });
      sender.start();
      await sender.dispatch(encodedEntry("p1"));
      await sender.dispatch(encodedEntry("p2"));

      peer.reachable = true;
      clock = 3000;
      await sender.dispatch(encodedEntry("p3"));

      expect(peer.packetBursts.map((burst) => burst.length)).toEqual([3]);
      expect(peer.titles).toEqual(["p1", "p2", "p3"]);
    });

    it("moves a packet whose write failed into the backlog", async () => {
      const { sender, backlog, connection } = createHarness(peer, { now });
      sender.start();
      await sender.dispatch(encodedEntry("a"));

      peer.failWrites(1);
      await sender.dispatch(encodedEntry("b"));
      expect(connection.state).toBe("disconnected");
      expect(backlog?.count).toBe(1);

      clock = 3000;
      await sender.dispatch(encodedEntry("c"));
      expect(peer.titles).toEqual(["a", "b", "c"]);
      expect(peer.packetBursts.map((burst) => burst.length)).toEqual([1, 2]);
    });

    it("keeps the backlog when the replay burst fails", async () => {
      peer.reachable = false;
      const { sender, backlog, connection } = createHarness(peer, { now });
      sender.start();
      await sender.dispatch(encodedEntry("p1"));

      peer.reachable = true;
      clock = 3000;
      // The log header goes through, the replay burst does not
      peer.failWrites(1, 1);
      await sender.dispatch(encodedEntry("p2"));
      expect(connection.state).toBe("disconnected");
      expect(backlog?.count).toBe(2);
      expect(peer.titles).toEqual([]);

      clock = 6000;
      await sender.dispatch(encodedEntry("p3"));
      expect(peer.packetBursts.map((burst) => burst.length)).toEqual([3]);
      expect(peer.titles).toEqual(["p1", "p2", "p3"]);
    });

    it("drops packets while disconnected when the backlog is disabled", async () => {
      peer.reachable = false;
      const { sender } = createHarness(peer, { now, backlog: false });
      sender.start();
      await sender.dispatch(encodedEntry("a"));
      expect(sender.stats).toEqual({ sent: 0, dropped: 1 });
    });

    it("stops trying after the first failure when reconnect is disabled", async () => {
      peer.reachable = false;
      const { sender, backlog } = createHarness(peer, { now, reconnect: false });
      sender.start();
      await sender.dispatch(encodedEntry("a"));

      peer.reachable = true;
      clock = 60_000;
      await sender.dispatch(encodedEntry("b"));

      expect(peer.connects).toHaveLength(1);
      expect(backlog?.count).toBe(0);
      expect(sender.stats).toEqual({ sent: 0, dropped: 2 });
    });
  });

  describe("flush-on", () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("delivers the backlog and the error that requested the flush as one burst", async () => {
      peer.reachable = false;
      const { sender, backlog } = createHarness(peer);
      sender.start();
      for (const title of ["d1", "d2", "d3", "d4", "d5"]) {
        await sender.dispatch(encodedEntry(title, Level.Debug));
      }
      expect(sender.flushTimerArmed).toBe(false);

      peer.reachable = true;
      await sender.dispatch(encodedEntry("e", Level.Error));
      expect(backlog?.flushPending).toBe(true);
      expect(sender.flushTimerArmed).toBe(true);
      expect(peer.connects).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(3000);
      await sender.stop();

      expect(peer.connects).toHaveLength(2);
      expect(peer.packetBursts).toHaveLength(1);
      expect(peer.titles).toEqual(["d1", "d2", "d3", "d4", "d5", "e"]);
      expect(backlog?.flushPending).toBe(false);
    });

    it("opens the connection only for flush bursts when keep-open is off", async () => {
      const { sender, connection } = createHarness(peer, { keepOpen: false });
      sender.start();
      await sender.dispatch(encodedEntry("m1"));
      await sender.dispatch(encodedEntry("m2"));
      expect(peer.connects).toHaveLength(0);

      await sender.dispatch(encodedEntry("e", Level.Error));

      expect(peer.connects).toHaveLength(1);
      expect(peer.packetBursts.map((burst) => burst.length)).toEqual([3]);
      expect(peer.titles).toEqual(["m1", "m2", "e"]);
      expect(connection.state).toBe("disconnected");
      expect(sender.flushTimerArmed).toBe(false);
    });
  });

  describe("async mode", () => {
    it("drains the queue in order and stops once it is empty", async () => {
      const { sender, queue } = createHarness(peer, { now, async: true });
      sender.start();
      for (const title of ["q1", "q2", "q3"]) {
        await queue?.enqueue(encodedEntry(title));
      }
      await sender.stop();

      expect(peer.connects).toHaveLength(1);
      expect(peer.titles).toEqual(["q1", "q2", "q3"]);
      expect(queue?.count).toBe(0);
    });

    it("discards queued packets when stopped without flush", async () => {
      const { sender, queue } = createHarness(peer, { now, async: true });
      for (const title of ["q1", "q2"]) {
        await queue?.enqueue(encodedEntry(title));
      }
      await sender.stop({ flush: false });

      expect(peer.titles).toEqual([]);
      expect(queue?.dropped).toBe(2);
    });
  });
});
