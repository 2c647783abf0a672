import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { createProcessSignalHandler, type SignalTarget } from "./process-signals.js";

type Listener = (signal: NodeJS.Signals) => void;

describe("createProcessSignalHandler", () => {
  let listeners: Map<NodeJS.Signals, Listener>;
  let exit: Mock<(code?: number) => never>;
  let target: SignalTarget;

  function emit(signal: NodeJS.Signals): void {
    const listener = listeners.get(signal);
    if (!listener) throw new Error(`no listener for ${signal}`);
    listener(signal);
  }

  beforeEach(() => {
    listeners = new Map();
    exit = vi.fn<(code?: number) => never>();
    target = {
      on: (signal, listener) => listeners.set(signal, listener),
      off: (signal) => listeners.delete(signal),
      exit,
    };
  });

  it("listens for SIGTERM and SIGINT once a callback is registered", () => {
    const handler = createProcessSignalHandler(target);
    expect(listeners.size).toBe(0);

    handler.onShutdown(async () => {});

    expect([...listeners.keys()].sort()).toEqual(["SIGINT", "SIGTERM"]);
  });

  it("runs every callback with the signal, then exits 0", async () => {
    const handler = createProcessSignalHandler(target);
    const first = vi.fn(async () => {});
    const second = vi.fn(async () => {});
    handler.onShutdown(first);
    handler.onShutdown(second);

    emit("SIGTERM");

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
    expect(first).toHaveBeenCalledWith("SIGTERM");
    expect(second).toHaveBeenCalledWith("SIGTERM");
  });

  it("exits 1 when a callback fails", async () => {
    const handler = createProcessSignalHandler(target);
    handler.onShutdown(async () => {
      throw new Error("stop failed");
    });

    emit("SIGINT");

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(1));
  });

  it("exits 1 at once on a second signal", () => {
    const handler = createProcessSignalHandler(target);
    handler.onShutdown(() => new Promise<void>(() => {}));

    emit("SIGINT");
    expect(exit).not.toHaveBeenCalled();

    emit("SIGINT");
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("removes its listeners", () => {
    const handler = createProcessSignalHandler(target);
    handler.onShutdown(async () => {});

    handler.removeAll();

    expect(listeners.size).toBe(0);
  });
});
