import { describe, expect, it } from "vitest";
import {
  alt,
  lineEndingWith,
  many0,
  oneOf,
  pair,
  parseAll,
  possessive,
  possessiveOf,
  preceded,
  tag,
  takeUntil,
  terminated,
  wholeNumber,
} from "../src/codec/combinators.js";
import { canonicalNumber } from "../src/codec/fragments.js";

describe("literals", () => {
  it("matches a tag and returns the rest", () => {
    expect(tag("Ball. ")("Ball. 2-1")).toEqual({ ok: true, value: "Ball. ", rest: "2-1" });
  });

  it("prefers the longest literal in oneOf", () => {
    const parser = oneOf([
      ["a", "short"],
      ["ab", "long"],
    ]);
    expect(parser("abc")).toEqual({ ok: true, value: "long", rest: "c" });
  });

  it("merges expectations when every alternative fails", () => {
    expect(alt(tag("a"), tag("b"))("c")).toEqual({ ok: false, expected: '"a" or "b"', found: "c" });
  });
});

describe("takeUntil", () => {
  it("consumes the delimiter", () => {
    expect(takeUntil(" hits a ")("Nova Hendricks hits a Single!")).toEqual({
      ok: true,
      value: "Nova Hendricks",
      rest: "Single!",
    });
  });

  it("keeps the trailing period of a name before a period delimiter", () => {
    expect(takeUntil(".")("Kaj Statter Jr.. Next")).toEqual({ ok: true, value: "Kaj Statter Jr.", rest: " Next" });
  });

  it("does not look past the current line", () => {
    expect(takeUntil(" to ")("First\nSecond to Third").ok).toBe(false);
  });

  it("needs some text before the delimiter", () => {
    expect(takeUntil(" hits ")(" hits a Single").ok).toBe(false);
  });
});

describe("lineEndingWith", () => {
  it("returns the line without its suffix and leaves the line break", () => {
    expect(lineEndingWith("!")("Go team!\nNext")).toEqual({ ok: true, value: "Go team", rest: "\nNext" });
  });

  it("rejects a line that is only the suffix", () => {
    expect(lineEndingWith("!")("!").ok).toBe(false);
  });
});

describe("possessives", () => {
  it("writes names ending in s with a bare apostrophe", () => {
    expect(possessiveOf("Sharks")).toBe("Sharks'");
    expect(possessiveOf("York Silk")).toBe("York Silk's");
  });

  it("accepts only the form possessiveOf would write", () => {
    expect(possessive("Sharks' bats")).toEqual({ ok: true, value: "Sharks", rest: "bats" });
    expect(possessive("York Silk's bat")).toEqual({ ok: true, value: "York Silk", rest: "bat" });
    expect(possessive("Jaylen Hotdogfingers's bat").ok).toBe(false);
  });
});

describe("numbers", () => {
  it("accepts only canonical numbers", () => {
    expect(canonicalNumber("4.5 runs")).toEqual({ ok: true, value: 4.5, rest: " runs" });
    expect(canonicalNumber("-3")).toEqual({ ok: true, value: -3, rest: "" });
    expect(canonicalNumber("4.0").ok).toBe(false);
    expect(canonicalNumber("04").ok).toBe(false);
  });

  it("composes counts from pieces", () => {
    const count = pair(wholeNumber, preceded("-", terminated(wholeNumber, ".")));
    expect(count("3-2.")).toEqual({ ok: true, value: [3, 2], rest: "" });
  });
});

describe("repetition and completeness", () => {
  it("repeats until the parser stops matching", () => {
    expect(many0(tag("ab"))("ababx")).toEqual({ ok: true, value: ["ab", "ab"], rest: "x" });
  });

  it("requires parseAll to consume everything", () => {
    expect(parseAll(tag("a"), "ab")).toEqual({ ok: false, expected: "end of text", found: "b" });
  });
});
