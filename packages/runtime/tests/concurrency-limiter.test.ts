import { describe, expect, it } from "vitest";
import { CancelledError, InvalidReleaseError, sleep } from "@flotilla/core";
import { ConcurrencyLimiter } from "../src/index";

describe("ConcurrencyLimiter", () => {
  it("never runs more than its capacity at once", async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        limiter.run(async () => {
          running += 1;
          peak = Math.max(peak, running);
          await sleep(5);
          running -= 1;
        })
      )
    );

    expect(peak).toBe(2);
    expect(limiter.inFlight).toBe(0);
  });

  it("admits waiters in arrival order", async () => {
    const limiter = new ConcurrencyLimiter(1);
    await limiter.acquire();

    const order: string[] = [];
    const waits = ["a", "b", "c"].map((name) => limiter.acquire().then(() => { order.push(name); }));
    expect(limiter.pending).toBe(3);

    for (const wait of waits) {
      limiter.release();
      await wait;
    }

    expect(order).toEqual(["a", "b", "c"]);
    expect(limiter.inFlight).toBe(1);
    limiter.release();
    expect(limiter.inFlight).toBe(0);
  });

  it("cancels a waiting acquire when its signal aborts", async () => {
    const limiter = new ConcurrencyLimiter(1);
    await limiter.acquire();
    const controller = new AbortController();

    const waiting = limiter.acquire(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toThrow(new CancelledError("Admission cancelled while waiting for a slot"));
    expect(limiter.pending).toBe(0);
    limiter.release();
    expect(limiter.inFlight).toBe(0);
  });

  it("refuses an already aborted signal", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(limiter.inFlight).toBe(0);
  });

  it("rejects a release without an acquire", () => {
    const limiter = new ConcurrencyLimiter(1);

    expect(() => limiter.release()).toThrow(InvalidReleaseError);
  });

  it("returns the slot when the task throws", async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(limiter.run(async () => { throw new Error("task failed"); })).rejects.toThrow("task failed");
    expect(limiter.inFlight).toBe(0);
  });

  it("requires a positive integer capacity", () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(1.5)).toThrow(RangeError);
  });
});
