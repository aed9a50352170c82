import { describe, expect, test, vi } from "vitest";
import { LifecycleEmitter } from "../src/index.js";

interface TestEvents {
  ping: { id: number };
  pong: { id: number };
}

describe("LifecycleEmitter", () => {
  test("calls listeners in registration order with the payload", async () => {
    const emitter = new LifecycleEmitter<TestEvents>();
    const calls: string[] = [];

    emitter.on("ping", ({ id }) => {
      calls.push(`first:${id}`);
    });
    emitter.on("ping", ({ id }) => {
      calls.push(`second:${id}`);
    });
    emitter.on("pong", () => {
      calls.push("pong");
    });

    await emitter.emit("ping", { id: 7 });

    expect(calls).toEqual(["first:7", "second:7"]);
  });

  test("awaits async listeners before the next one runs", async () => {
    const emitter = new LifecycleEmitter<TestEvents>();
    const calls: string[] = [];

    emitter.on("ping", async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      calls.push("slow");
    });
    emitter.on("ping", () => {
      calls.push("fast");
    });

    await emitter.emit("ping", { id: 1 });

    expect(calls).toEqual(["slow", "fast"]);
  });

  test("stops calling a listener once it is removed", async () => {
    const emitter = new LifecycleEmitter<TestEvents>();
    const listener = vi.fn();
    const other = vi.fn();

    const unsubscribe = emitter.on("ping", listener);
    emitter.on("ping", other);
    unsubscribe();
    emitter.off("ping", other);

    await emitter.emit("ping", { id: 1 });

    expect(listener).not.toHaveBeenCalled();
    expect(other).not.toHaveBeenCalled();
    expect(emitter.listenerCount("ping")).toBe(0);
  });

  test("logs a failing listener and keeps notifying the rest", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const emitter = new LifecycleEmitter<TestEvents>(logger);
    const after = vi.fn();

    emitter.on("pong", () => {
      throw new Error("listener broke");
    });
    emitter.on("pong", after);

    await expect(emitter.emit("pong", { id: 2 })).resolves.toBeUndefined();

    expect(after).toHaveBeenCalledWith({ id: 2 });
    expect(logger.error).toHaveBeenCalledWith('Listener for "pong" failed', {
      error: "listener broke",
    });
  });
});
