import { describe, expect, it } from "vitest";
import { InvariantViolationError } from "./errors.js";
import { RecencyList } from "./recency.js";

function keysFromLeast(list: RecencyList<string, number>): string[] {
  return [...list.fromLeastRecent()].map((h) => list.keyOf(h));
}

describe("RecencyList", () => {
  it("orders pushed nodes from least to most recent", () => {
    const list = new RecencyList<string, number>();
    list.pushMostRecent("a", 1, 3);
    list.pushMostRecent("b", 2, 4);
    list.pushMostRecent("c", 3, 5);

    expect(keysFromLeast(list)).toEqual(["a", "b", "c"]);
    expect([...list.fromMostRecent()].map((h) => list.keyOf(h))).toEqual([
      "c",
      "b",
      "a",
    ]);
    expect(list.length).toBe(3);
  });

  it("promote moves a node from anywhere to the most recent end", () => {
    const list = new RecencyList<string, number>();
    const a = list.pushMostRecent("a", 1, 1);
    const b = list.pushMostRecent("b", 2, 1);
    list.pushMostRecent("c", 3, 1);

    list.promote(b);
    expect(keysFromLeast(list)).toEqual(["a", "c", "b"]);

    list.promote(a);
    expect(keysFromLeast(list)).toEqual(["c", "b", "a"]);

    // already most recent
    list.promote(a);
    expect(keysFromLeast(list)).toEqual(["c", "b", "a"]);
    expect(list.length).toBe(3);
  });

  it("popLeastRecent unlinks the head but keeps it readable until released", () => {
    const list = new RecencyList<string, number>();
    list.pushMostRecent("a", 10, 3);
    list.pushMostRecent("b", 20, 4);

    const popped = list.popLeastRecent();
    expect(popped).toBeDefined();
    if (popped === undefined) return;

    expect(list.keyOf(popped)).toBe("a");
    expect(list.valueOf(popped)).toBe(10);
    expect(list.weightOf(popped)).toBe(3);
    expect(list.length).toBe(1);

    list.release(popped);
    expect(list.isLive(popped)).toBe(false);
    expect(keysFromLeast(list)).toEqual(["b"]);
  });

  it("popLeastRecent on an empty list returns undefined", () => {
    const list = new RecencyList<string, number>();
    expect(list.popLeastRecent()).toBeUndefined();
  });

  it("removes a node from the middle, head and tail", () => {
    const list = new RecencyList<string, number>();
    const a = list.pushMostRecent("a", 1, 1);
    const b = list.pushMostRecent("b", 2, 1);
    const c = list.pushMostRecent("c", 3, 1);
    const d = list.pushMostRecent("d", 4, 1);

    list.remove(b);
    expect(keysFromLeast(list)).toEqual(["a", "c", "d"]);
    list.remove(a);
    expect(keysFromLeast(list)).toEqual(["c", "d"]);
    list.remove(d);
    expect(keysFromLeast(list)).toEqual(["c"]);
    list.remove(c);
    expect(keysFromLeast(list)).toEqual([]);
    expect(list.length).toBe(0);
  });

  it("reuses released slots before growing the arena", () => {
    const list = new RecencyList<string, number>();
    list.pushMostRecent("a", 1, 1);
    const b = list.pushMostRecent("b", 2, 1);
    list.pushMostRecent("c", 3, 1);

    list.remove(b);
    list.release(b);

    const d = list.pushMostRecent("d", 4, 1);
    expect(d).toBe(b);
    // arena did not grow: the next fresh slot is still index 3
    expect(list.pushMostRecent("e", 5, 1)).toBe(3);
    expect(keysFromLeast(list)).toEqual(["a", "c", "d", "e"]);
  });

  it("rejects operations on handles that are not live or not linked", () => {
    const list = new RecencyList<string, number>();
    const a = list.pushMostRecent("a", 1, 1);

    expect(() => list.release(a)).toThrow(InvariantViolationError);

    list.remove(a);
    expect(() => list.remove(a)).toThrow(InvariantViolationError);
    expect(() => list.promote(a)).toThrow(InvariantViolationError);

    list.release(a);
    expect(() => list.keyOf(a)).toThrow(InvariantViolationError);
    expect(() => list.release(a)).toThrow(InvariantViolationError);
    expect(() => list.valueOf(42)).toThrow(InvariantViolationError);
  });

  it("clear drops every node and slot", () => {
    const list = new RecencyList<string, number>();
    list.pushMostRecent("a", 1, 1);
    list.pushMostRecent("b", 2, 1);

    list.clear();

    expect(list.length).toBe(0);
    expect(list.popLeastRecent()).toBeUndefined();
    // slots start over from index 0
    expect(list.pushMostRecent("c", 3, 1)).toBe(0);
  });
});
