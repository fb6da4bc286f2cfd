import { expect, test } from "vitest";
import { TemplateSyntaxError } from "../src/errors.ts";
import { hasBackReference, shiftGroups, stripCaptures } from "../src/template/groups.ts";
import { tokenizeTemplate } from "../src/template/syntax.ts";

test("tokenizeTemplate splits placeholders from surrounding text", () => {
  expect(tokenizeTemplate("<year>-<month>")).toEqual([
    { kind: "placeholder", value: "<year>", name: "year", assignment: null, closed: true },
    { kind: "text", value: "-" },
    { kind: "placeholder", value: "<month>", name: "month", assignment: null, closed: true },
  ]);
});

test("tokenizeTemplate unescapes > inside constant assignments", () => {
  expect(tokenizeTemplate(String.raw`<text=3 \> 2>`)).toEqual([
    { kind: "placeholder", value: String.raw`<text=3 \> 2>`, name: "text", assignment: "3 > 2", closed: true },
  ]);
});

test("tokenizeTemplate recognizes groups, escapes, quantifiers and back-references", () => {
  expect(tokenizeTemplate(String.raw`(?<when>\d+)\1`)).toEqual([
    { kind: "open", value: "(?<when>", capturing: true, name: "when" },
    { kind: "escape", value: String.raw`\d` },
    { kind: "quantifier", value: "+" },
    { kind: "close", value: ")" },
    { kind: "backref", value: String.raw`\1`, index: 1 },
  ]);

  expect(tokenizeTemplate("(?:a|b*?)x{2,3}")).toEqual([
    { kind: "open", value: "(?:", capturing: false, name: null },
    { kind: "text", value: "a" },
    { kind: "alternation", value: "|" },
    { kind: "text", value: "b" },
    { kind: "quantifier", value: "*?" },
    { kind: "close", value: ")" },
    { kind: "text", value: "x" },
    { kind: "quantifier", value: "{2,3}" },
  ]);
});

test("tokenizeTemplate leaves character classes and stray < as they are", () => {
  expect(tokenizeTemplate("[<a>]")).toEqual([{ kind: "class", value: "[<a>]" }]);
  expect(tokenizeTemplate("a < b")).toEqual([{ kind: "text", value: "a < b" }]);
  expect(tokenizeTemplate("^.$")).toEqual([
    { kind: "meta", value: "^" },
    { kind: "meta", value: "." },
    { kind: "meta", value: "$" },
  ]);
});

test("tokenizeTemplate marks placeholders that never close", () => {
  expect(tokenizeTemplate("on <DATE")).toEqual([
    { kind: "text", value: "on " },
    { kind: "placeholder", value: "<DATE", name: "DATE", assignment: null, closed: false },
  ]);
  expect(tokenizeTemplate("x<y+1")).toEqual([
    { kind: "text", value: "x" },
    { kind: "placeholder", value: "<y", name: "y", assignment: null, closed: false },
    { kind: "quantifier", value: "+" },
    { kind: "text", value: "1" },
  ]);
});

test("tokenizeTemplate rejects an assignment without its closing >", () => {
  expect(() => tokenizeTemplate("<a=1")).toThrow(TemplateSyntaxError);
});

test("shiftGroups keeps captures and moves back-references past an offset", () => {
  expect(shiftGroups(String.raw`((['"])(?<v>[a-z]+)(?:\2))[\1]`, 3)).toBe(String.raw`((['"])([a-z]+)(?:\5))[\1]`);
  expect(hasBackReference(String.raw`(a)(?:\1)`)).toBe(true);
  expect(hasBackReference(String.raw`[\1]\d\\1`)).toBe(false);
});

test("stripCaptures turns capturing groups into non-capturing ones", () => {
  expect(stripCaptures(String.raw`(a)(?:b)(?<n>c)[(]\((?=d)`)).toBe(
    String.raw`(?:a)(?:b)(?:c)[(]\((?=d)`,
  );
});
