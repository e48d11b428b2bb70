import { describe, expect, it } from "vitest";
import { createLimiter } from "./limiter.js";

describe("createLimiter", () => {
  it("never waits without a limit", async () => {
    const limiter = createLimiter();
    await Promise.all(Array.from({ length: 100 }, () => limiter.acquire()));
    expect(limiter.active).toBe(100);
  });

  it("holds acquirers beyond the limit until a release", async () => {
    const limiter = createLimiter(2);
    const order: number[] = [];
    await limiter.acquire();
    await limiter.acquire();

    const third = limiter.acquire().then(() => order.push(3));
    const fourth = limiter.acquire().then(() => order.push(4));
    await Promise.resolve();
    expect(order).toEqual([]);

    limiter.release();
    await third;
    expect(order).toEqual([3]);
    expect(limiter.active).toBe(2);

    limiter.release();
    await fourth;
    expect(order).toEqual([3, 4]);

    limiter.release();
    limiter.release();
    expect(limiter.active).toBe(0);
  });

  it("rejects a limit below one", () => {
    expect(() => createLimiter(0)).toThrowError("Invalid limit: 0");
  });
});
