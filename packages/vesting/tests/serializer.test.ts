/**
 * Tests for the per-key mutation serializer.
 */

import { describe, it, expect } from "vitest";
import { KeyedSerializer } from "../src/serializer.js";

function tick(ms = 1): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("KeyedSerializer", () => {
  it("runs tasks on one key in submission order", async () => {
    const serializer = new KeyedSerializer();
    const log: string[] = [];

    const slow = serializer.run("a", async () => {
      log.push("slow:start");
      await tick(10);
      log.push("slow:end");
      return 1;
    });
    const fast = serializer.run("a", async () => {
      log.push("fast");
      return 2;
    });

    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(log).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("runs different keys concurrently", async () => {
    const serializer = new KeyedSerializer();
    const log: string[] = [];

    const a = serializer.run("a", async () => {
      await tick(10);
      log.push("a");
    });
    const b = serializer.run("b", async () => {
      log.push("b");
    });

    await Promise.all([a, b]);
    expect(log).toEqual(["b", "a"]);
  });

  it("keeps going after a rejected task", async () => {
    const serializer = new KeyedSerializer();

    const failing = serializer.run("a", async () => {
      throw new Error("boom");
    });
    const next = serializer.run("a", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    expect(await next).toBe("ok");
  });

  it("forgets idle keys", async () => {
    const serializer = new KeyedSerializer();
    const task = serializer.run("a", async () => undefined);
    expect(serializer.pendingKeys).toBe(1);

    await task;
    await tick();
    expect(serializer.pendingKeys).toBe(0);
  });
});
