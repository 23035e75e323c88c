import { describe, it, expect } from "vitest";
import { Mutex } from "./mutex.js";

describe("Mutex", () => {
  it("serves waiters in FIFO order", async () => {
    const mutex = new Mutex();
    const order: number[] = [];
    const release = await mutex.acquire();

    const tasks = [1, 2, 3].map((n) => mutex.runExclusive(() => void order.push(n)));
    expect(mutex.waiting).toBe(3);

    release();
    await Promise.all(tasks);

    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked).toBe(false);
  });

  it("releases when the task throws", async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(mutex.isLocked).toBe(false);
  });

  it("ignores a second release", async () => {
    const mutex = new Mutex();
    const first = await mutex.acquire();
    first();
    const second = await mutex.acquire();

    first();
    expect(mutex.isLocked).toBe(true);

    second();
    expect(mutex.isLocked).toBe(false);
  });

  it("keeps read-modify-write sections from interleaving", async () => {
    const mutex = new Mutex();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 10 }, () =>
        mutex.runExclusive(async () => {
          const read = counter;
          await Promise.resolve();
          counter = read + 1;
        }),
      ),
    );

    expect(counter).toBe(10);
  });
});
