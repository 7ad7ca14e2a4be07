import { describe, it, expect } from "vitest";
import { KeyedMutex } from "../src/keyed-mutex.js";

function deferred() {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs work for one key strictly in order", async () => {
    const mutex = new KeyedMutex<number>();
    const gate = deferred();
    const log: string[] = [];

    const first = mutex.run(1, async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
    });
    const second = mutex.run(1, async () => {
      log.push("second");
    });

    await Promise.resolve();
    expect(log).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
  });

  it("lets different keys proceed independently", async () => {
    const mutex = new KeyedMutex<number>();
    const gate = deferred();
    const log: string[] = [];

    const blocked = mutex.run(1, async () => {
      await gate.promise;
      log.push("one");
    });
    await mutex.run(2, async () => {
      log.push("two");
    });

    expect(log).toEqual(["two"]);
    gate.resolve();
    await blocked;
    expect(log).toEqual(["two", "one"]);
  });

  it("keeps the queue moving after a failure and forgets idle keys", async () => {
    const mutex = new KeyedMutex<string>();

    const failing = mutex.run("a", async () => {
      throw new Error("nope");
    });
    const next = mutex.run("a", async () => "ran");

    await expect(failing).rejects.toThrow("nope");
    expect(await next).toBe("ran");
    expect(mutex.size).toBe(0);
  });
});
