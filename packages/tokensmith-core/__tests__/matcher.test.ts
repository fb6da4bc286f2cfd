import { expect, test } from "vitest";
import { Builder, TemplateSyntaxError, type MatchResult } from "../src/index.ts";
import { calendarBuilder, shapesBuilder } from "./fixtures/tokens.ts";

test("match anchors at the start while search scans forward", () => {
  const { builder } = calendarBuilder();

  expect(builder.match("<DATE>", "due 2025-12-29")).toBeNull();

  const found = builder.search("<DATE>", "due 2025-12-29 ok");
  expect(found?.index).toBe(4);
  expect(found?.text).toBe("2025-12-29");
  expect(found?.start()).toBe(4);
  expect(found?.end()).toBe(14);
  expect(found?.span()).toEqual([4, 14]);
});

test("fullmatch requires the whole input", () => {
  const { builder, DateToken } = calendarBuilder();

  expect(builder.fullmatch("<DATE>", "2025-12-29 ")).toBeNull();
  expect(builder.fullmatch("<DATE>", "2025-12-29")?.get(DateToken)).toEqual({
    year: 2025,
    month: 12,
    date: 29,
  });
});

test("search starts at the given offset", () => {
  const { builder, DateToken } = calendarBuilder();
  const matcher = builder.compile("<DATE>");

  expect(matcher.search("2025-01-01 2025-02-02", 1)?.get(DateToken)).toEqual({
    year: 2025,
    month: 2,
    date: 2,
  });
});

test("findAll returns each polymorphic match as its most specific record", () => {
  const { builder } = shapesBuilder();

  expect(builder.findAll("<Pair>", "1, 2; x=3, y=4; x=5, y=6, z=7; 8 + 9i")).toEqual([
    { x: 1, y: 2 },
    { x: 3, y: 4 },
    { x: 5, y: 6, z: 7 },
    { x: 8, y: 9 },
  ]);
});

test("findAll pairs template groups with token records in pattern order", () => {
  const { builder } = calendarBuilder();

  expect(builder.findAll(String.raw`(\w+)=<DATE>`, "a=2025-01-01 b=2025/02/02")).toEqual([
    ["a", { year: 2025, month: 1, date: 1 }],
    ["b", { year: 2025, month: 2, date: 2 }],
  ]);
});

test("findAll falls back to the matched text without tokens or groups", () => {
  const builder = new Builder();

  expect(builder.findAll(String.raw`\d+`, "a1b22")).toEqual(["1", "22"]);
});

test("matchAll steps over empty matches", () => {
  const builder = new Builder();

  expect(builder.matchAll("x*", "ab").map((match) => match.index)).toEqual([0, 1, 2]);
});

test("replace rewrites matches through a callback", () => {
  const { builder, DateToken } = calendarBuilder();
  const toDotted = (match: MatchResult) => {
    const date = match.get(DateToken);
    return date ? `${date.date}.${date.month}.${date.year}` : match.text;
  };
  const text = "from 2025-01-02 to 2025/03/04";

  expect(builder.replace("<DATE>", text, toDotted)).toBe("from 2.1.2025 to 4.3.2025");
  expect(builder.replace("<DATE>", text, "?", 1)).toBe("from ? to 2025/03/04");
});

test("replace expands group references in replacement strings", () => {
  const builder = new Builder();

  expect(builder.replace(String.raw`(\w+)@(?<host>\w+)`, "mail ann@example now", "$<host>:$1 $$ $&")).toBe(
    "mail example:ann $ ann@example now",
  );
});

test("split interleaves template groups between the pieces", () => {
  const builder = new Builder();

  expect(builder.split(String.raw`\s*(,|;)\s*`, "a, b;c")).toEqual(["a", ",", "b", ";", "c"]);
  expect(builder.split(String.raw`\s*(,|;)\s*`, "a, b;c", 1)).toEqual(["a", ",", "b;c"]);
});

test("construct needs exactly one top-level token", () => {
  const { builder } = calendarBuilder();
  const matcher = builder.compile("<DATE> <DATE>");

  expect(() => matcher.construct("2025-01-01 2025-01-02")).toThrow(TemplateSyntaxError);
  expect(builder.compile("on <DATE>").construct("on 2025-01-01")).toEqual({ year: 2025, month: 1, date: 1 });
  expect(builder.compile("on <DATE>").construct("at 2025-01-01")).toBeNull();
});

test("spans of groups that did not take part are -1", () => {
  const builder = new Builder();
  const match = builder.match("a(b)?(c)", "ac");

  expect(match?.group(1)).toBeUndefined();
  expect(match?.start(1)).toBe(-1);
  expect(match?.end(2)).toBe(2);
  expect(match?.span(1)).toBeNull();
});
