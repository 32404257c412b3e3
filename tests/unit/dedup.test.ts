import { describe, it, expect } from "vitest";
import { DedupWindow, claimMessage } from "../../src/dedup/index.js";

describe("DedupWindow", () => {
  it("gives each rule the union of both generations", () => {
    const window = new DedupWindow();
    window.rotate();
    const seen = window.beginRule();
    seen.add("<a@example.com>");
    window.endRule(seen);

    window.rotate();
    const next = window.beginRule();
    next.add("<b@example.com>");
    window.endRule(next);

    expect([...window.beginRule()].sort()).toEqual(["<a@example.com>", "<b@example.com>"]);
  });

  it("keeps only identifiers new to this wake-up in current", () => {
    const window = new DedupWindow();
    window.rotate();
    const first = window.beginRule();
    first.add("<a@example.com>");
    window.endRule(first);

    window.rotate();
    const second = window.beginRule();
    second.add("<b@example.com>");
    window.endRule(second);

    expect(window.snapshot()).toEqual({
      previous: ["<a@example.com>"],
      current: ["<b@example.com>"],
    });
  });

  it("forgets an identifier two wake-ups after it was last claimed", () => {
    const window = new DedupWindow();
    window.rotate();
    const seen = window.beginRule();
    seen.add("<a@example.com>");
    window.endRule(seen);

    window.rotate();
    window.endRule(window.beginRule());
    expect(window.has("<a@example.com>")).toBe(true);

    window.rotate();
    expect(window.has("<a@example.com>")).toBe(false);
  });

  it("carries identifiers from one rule to the next within a wake-up", () => {
    const window = new DedupWindow();
    window.rotate();
    const first = window.beginRule();
    first.add("<a@example.com>");
    window.endRule(first);

    expect(window.beginRule().has("<a@example.com>")).toBe(true);
  });
});

describe("claimMessage", () => {
  it("claims an identifier once", () => {
    const seen = new Set<string>();
    expect(claimMessage("<a@example.com>", seen)).toBe(true);
    expect(claimMessage("<a@example.com>", seen)).toBe(false);
    expect(seen.has("<a@example.com>")).toBe(true);
  });
});
