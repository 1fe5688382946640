import { describe, it, expect } from "vitest";
import { KeyedLock } from "./keyed-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs tasks under the same key one at a time in arrival order", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive("alice::hw1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.runExclusive("alice::hw1", async () => {
      order.push("second:start");
      order.push("second:end");
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  it("does not block tasks under a different key", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.runExclusive("alice::hw1", async () => {
      await gate.promise;
      order.push("alice");
    });
    await lock.runExclusive("bob::hw1", async () => {
      order.push("bob");
    });

    expect(order).toEqual(["bob"]);
    gate.resolve();
    await blocked;
    expect(order).toEqual(["bob", "alice"]);
  });

  it("releases the key when a task fails", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.runExclusive("alice::hw1", async () => {
        throw new Error("calendar down");
      })
    ).rejects.toThrow("calendar down");

    await expect(lock.runExclusive("alice::hw1", async () => "recovered")).resolves.toBe("recovered");
  });

  it("drops idle keys once every task has finished", async () => {
    const lock = new KeyedLock();

    await Promise.all([
      lock.runExclusive("alice::hw1", async () => 1),
      lock.runExclusive("alice::hw1", async () => 2)
    ]);

    expect(lock.isLocked("alice::hw1")).toBe(false);
    expect(lock.size).toBe(0);
  });
});
