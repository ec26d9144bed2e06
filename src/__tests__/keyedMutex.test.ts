import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../lib/keyedMutex";
import { withTimeout } from "../lib/timeout";
import { TimeoutError } from "../errors";
import { deferred, sleep } from "./fakes";

describe("KeyedMutex", () => {
  it("runs tasks for one key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: number[] = [];

    await Promise.all(
      [30, 10, 0].map((delay, index) =>
        mutex.runExclusive("repo", async () => {
          await sleep(delay);
          order.push(index);
        })
      )
    );

    expect(order).toEqual([0, 1, 2]);
  });

  it("forgets keys once idle", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();
    const running = mutex.runExclusive("repo", () => gate.promise);

    expect(mutex.isLocked("repo")).toBe(true);
    gate.resolve();
    await running;
    expect(mutex.isLocked("repo")).toBe(false);
  });
});

describe("withTimeout", () => {
  it("resolves with the work's value", async () => {
    expect(await withTimeout(Promise.resolve("done"), 50, "Work")).toBe("done");
  });

  it("rejects with a TimeoutError naming the operation", async () => {
    const error = await withTimeout(sleep(200), 10, "Generating the proposal").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: "Generating the proposal timed out after 10ms", timeoutMs: 10 });
  });
});
