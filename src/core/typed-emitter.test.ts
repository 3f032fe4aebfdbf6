import { describe, expect, it, vi } from "vitest";
import { TypedEventEmitter } from "./typed-emitter.js";

interface PipelineEvents {
  state: { from: string; to: string };
  drained: number;
}

class PipelineEmitter extends TypedEventEmitter<PipelineEvents> {
  fire<K extends keyof PipelineEvents & string>(event: K, payload: PipelineEvents[K]): boolean {
    return this.emit(event, payload);
  }
}

describe("TypedEventEmitter", () => {
  it("delivers the payload to every listener", () => {
    const emitter = new PipelineEmitter();
    const a = vi.fn();
    const b = vi.fn();
    emitter.on("state", a).on("state", b);

    expect(emitter.fire("state", { from: "disconnected", to: "connecting" })).toBe(true);
    expect(a).toHaveBeenCalledWith({ from: "disconnected", to: "connecting" });
    expect(b).toHaveBeenCalledTimes(1);
  });

  it("reports whether anyone listened", () => {
    expect(new PipelineEmitter().fire("drained", 3)).toBe(false);
  });

  it("runs once-listeners a single time", () => {
    const emitter = new PipelineEmitter();
    const listener = vi.fn();
    emitter.once("drained", listener);
    emitter.fire("drained", 1);
    emitter.fire("drained", 2);
    expect(listener).toHaveBeenCalledOnce();
    expect(listener).toHaveBeenCalledWith(1);
  });

  it("removes listeners individually and in bulk", () => {
    const emitter = new PipelineEmitter();
    const listener = vi.fn();
    emitter.on("drained", listener);
    emitter.on("state", vi.fn());
    emitter.off("drained", listener);
    expect(emitter.listenerCount("drained")).toBe(0);

    emitter.on("drained", listener);
    emitter.removeAllListeners("drained");
    expect(emitter.listenerCount("state")).toBe(1);
    emitter.removeAllListeners();
    expect(emitter.listenerCount("state")).toBe(0);
  });

  it("accepts more listeners than the node default without warning", () => {
    const warn = vi.spyOn(process, "emitWarning");
    const emitter = new PipelineEmitter();
    for (let i = 0; i < 15; i++) emitter.on("drained", () => {});
    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });

  it("propagates a throwing listener", () => {
    const emitter = new PipelineEmitter();
    emitter.on("drained", () => {
      throw new Error("listener failed");
    });
    expect(() => emitter.fire("drained", 0)).toThrow("listener failed");
  });
});
