import { describe, it, expect } from "vitest";
import { RecencyList } from "../src/recency-list.js";

describe("RecencyList", () => {
  it("orders keys by first insertion", () => {
    const list = new RecencyList<number>();
    list.touch(1);
    list.touch(2);
    list.touch(3);
    expect(list.keys()).toEqual([1, 2, 3]);
    expect(list.oldest()).toBe(1);
    expect(list.size).toBe(3);
  });

  it("moves a touched key to the most recent end", () => {
    const list = new RecencyList<number>();
    list.touch(1);
    list.touch(2);
    list.touch(3);
    list.touch(1);
    expect(list.keys()).toEqual([2, 3, 1]);
    expect(list.oldest()).toBe(2);
    expect(list.size).toBe(3);
  });

  it("removes arbitrary keys", () => {
    const list = new RecencyList<number>();
    list.touch(1);
    list.touch(2);
    list.touch(3);
    expect(list.remove(2)).toBe(true);
    expect(list.remove(9)).toBe(false);
    expect(list.keys()).toEqual([1, 3]);
    expect(list.remove(1)).toBe(true);
    expect(list.oldest()).toBe(3);
    expect(list.has(1)).toBe(false);
  });

  it("is empty after clear", () => {
    const list = new RecencyList<number>();
    list.touch(4);
    list.clear();
    expect(list.oldest()).toBeNull();
    expect(list.size).toBe(0);
    expect(list.keys()).toEqual([]);
  });
});
