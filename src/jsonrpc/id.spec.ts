import { describe, expect, it } from "vitest";
import { MAX_ID, createIdStore } from "./id.js";

describe("createIdStore", () => {
  it("allocates strictly increasing ids", () => {
    const ids = createIdStore();
    const taken = Array.from({ length: 100 }, () => ids.take());

    expect(taken).toStrictEqual(Array.from({ length: 100 }, (_, i) => i));
    expect(ids.current).toBe(100);
  });

  it("wraps around after the largest 32-bit id", () => {
    const ids = createIdStore(MAX_ID);
    expect(ids.take()).toBe(4294967295);
    expect(ids.take()).toBe(0);
  });

  it("exposes no way to rewind", () => {
    const ids = createIdStore(41);
    ids.take();
    expect(Object.keys(ids).sort()).toEqual(["current", "take"]);
    expect(ids.take()).toBe(42);
  });
});
