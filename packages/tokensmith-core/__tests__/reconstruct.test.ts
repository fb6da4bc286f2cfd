import { expect, test } from "vitest";
import {
  Builder,
  ReconstructionError,
  UnknownOccurrenceError,
  field,
} from "../src/index.ts";
import { calendarBuilder, ordersBuilder, shapesBuilder } from "./fixtures/tokens.ts";

test("DATE token reconstructs integer fields from either spelling", () => {
  const { builder, DateToken } = calendarBuilder();

  const dashed = builder.match("<DATE>", "2025-12-29");
  expect(dashed?.get(DateToken)).toEqual({ year: 2025, month: 12, date: 29 });

  const slashed = builder.match("<DATE>", "2025/12/29");
  expect(slashed?.get(DateToken)).toEqual({ year: 2025, month: 12, date: 29 });
});

test("optional trailing clause reconstructs to null or a parsed date-time", () => {
  const builder = new Builder();
  const Order = builder.register({
    name: "Shipment",
    template: "order <order_id> shipped <shipped_at>(?: delivered <delivered_at>)?",
    fields: {
      order_id: field.integer(),
      shipped_at: field.datetime(),
      delivered_at: field.optional(field.datetime()),
    },
  });

  const pending = builder.match("<Shipment>", "order 7 shipped 2025-01-02 03:04:05");
  expect(pending?.get(Order)).toEqual({
    order_id: 7,
    shipped_at: new Date(Date.UTC(2025, 0, 2, 3, 4, 5)),
    delivered_at: null,
  });

  const delivered = builder.match(
    "<Shipment>",
    "order 8 shipped 2025-01-02 03:04:05 delivered 2025-01-03T10:00:00",
  );
  expect(delivered?.get(Order)?.delivered_at?.toISOString()).toBe("2025-01-03T10:00:00.000Z");
});

test("list field distinguishes absent, empty and populated segments", () => {
  const { builder, Schedule } = calendarBuilder();

  const populated = builder.match(
    "<Schedule>",
    "practice baseball dates = [2025-01-01, 2025/02/02, 2026-03-03]",
  );
  expect(populated?.get(Schedule)).toEqual({
    subject: "practice baseball",
    dates: [
      { year: 2025, month: 1, date: 1 },
      { year: 2025, month: 2, date: 2 },
      { year: 2026, month: 3, date: 3 },
    ],
  });

  const empty = builder.match("<Schedule>", "practice baseball dates = []");
  expect(empty?.get(Schedule)).toEqual({ subject: "practice baseball", dates: [] });

  const absent = builder.match("<Schedule>", "practice baseball");
  expect(absent?.get(Schedule)).toEqual({ subject: "practice baseball", dates: null });
});

test("empty literal stands for an empty list", () => {
  const builder = new Builder();
  const Plan = builder.register({
    name: "Plan",
    template: String.raw`^<subject>:\s*<dates>$`,
    fields: {
      subject: field.text(),
      dates: field.list(field.integer(), { empty: "TBD" }),
    },
  });

  expect(builder.match("<Plan>", "review: TBD")?.get(Plan)).toEqual({ subject: "review", dates: [] });
  expect(builder.match("<Plan>", "review: 3, 4,5")?.get(Plan)).toEqual({
    subject: "review",
    dates: [3, 4, 5],
  });
});

test("custom separator and item pattern drive the list re-scan", () => {
  const builder = new Builder();
  const Tags = builder.register({
    name: "Tags",
    template: "tags: <tags>",
    fields: {
      tags: field.list(field.text(), { pattern: "[a-z]+", separator: String.raw`\s*;\s*`, required: true }),
    },
  });

  expect(builder.fullmatch("<Tags>", "tags: red ; green;blue")?.get(Tags)).toEqual({
    tags: ["red", "green", "blue"],
  });
  expect(builder.fullmatch("<Tags>", "tags: ")).toBeNull();
});

test("supertype reference dispatches to the most specific matching subtype", () => {
  const { builder, Pair, Coordinate, Point3D } = shapesBuilder();
  const matcher = builder.compile("<Pair>");

  const complex = matcher.match("1 + 2i");
  expect(complex?.reconstruct(Pair)).toEqual({
    status: "matched",
    token: "Complex",
    value: { x: 1, y: 2 },
  });
  expect(complex?.reconstruct(Coordinate)).toEqual({ status: "absent" });

  const point = matcher.match("x=1, y=2, z=3");
  expect(point?.reconstruct(Pair)).toEqual({
    status: "matched",
    token: "Point3D",
    value: { x: 1, y: 2, z: 3 },
  });
  expect(point?.get(Point3D)).toEqual({ x: 1, y: 2, z: 3 });

  const plain = matcher.match("3, 4");
  expect(plain?.reconstruct(Pair)).toEqual({ status: "matched", token: "Pair", value: { x: 3, y: 4 } });
});

test("handles accept records of their subtypes only", () => {
  const { builder, Pair, Coordinate, Complex } = shapesBuilder();

  const coordinate = builder.construct(Pair, "x=5, y=6");
  expect(coordinate).toEqual({ x: 5, y: 6 });
  expect(Pair.accepts(coordinate)).toBe(true);
  expect(Coordinate.accepts(coordinate)).toBe(true);
  expect(Complex.accepts(coordinate)).toBe(false);
  expect(Pair.accepts({ x: 5, y: 6 })).toBe(false);
});

test("occurrence index selects each textual occurrence in order", () => {
  const { builder, DateToken } = calendarBuilder();
  const match = builder.match("from <DATE> to <DATE>", "from 2025-01-02 to 2025/03/04");

  expect(match?.get(DateToken, 1)).toEqual({ year: 2025, month: 1, date: 2 });
  expect(match?.get(DateToken, 2)).toEqual({ year: 2025, month: 3, date: 4 });
  expect(match?.spanOf(DateToken, 2)).toEqual([19, 29]);
});

test("occurrence outside the pattern is a usage error", () => {
  const { builder, DateToken, Schedule } = calendarBuilder();
  const match = builder.match("<DATE>", "2025-01-02");

  expect(() => match?.get(DateToken, 2)).toThrow(UnknownOccurrenceError);
  expect(() => match?.get(Schedule)).toThrow("Token Schedule does not occur in this pattern.");
});

test("occurrence in a skipped optional segment is absent", () => {
  const { builder, DateToken } = calendarBuilder();
  const match = builder.match("due(?: <DATE>)?", "due soon");

  expect(match?.reconstruct(DateToken)).toEqual({ status: "absent" });
  expect(match?.get(DateToken)).toBeNull();
  expect(match?.spanOf(DateToken)).toBeNull();
});

test("constant assignments consume no input", () => {
  const builder = new Builder();
  const Person = builder.register({
    name: "Person",
    template: "(?:John<name=John><height=180><weight=75>|Mary<name=Mary><height=165><weight=54>)",
    fields: { name: field.text(), height: field.integer(), weight: field.integer() },
  });

  expect(builder.construct(Person, "John")).toEqual({ name: "John", height: 180, weight: 75 });
  expect(builder.construct(Person, "Mary")).toEqual({ name: "Mary", height: 165, weight: 54 });
  expect(builder.construct(Person, "Bob")).toBeNull();
});

test("constants of every primitive kind are converted", () => {
  const builder = new Builder();
  const Preset = builder.register({
    name: "Preset",
    template:
      "preset<flag=true><count=42><ratio=3.5><amount=+12.50><born=1990-05-12>" +
      "<login=2026-01-02 03:04:05><alarm=07:30:00.25><uid=123E4567-E89B-12D3-A456-426614174000><note=hello>",
    fields: {
      flag: field.boolean(),
      count: field.integer(),
      ratio: field.float(),
      amount: field.decimal(),
      born: field.date(),
      login: field.datetime(),
      alarm: field.time(),
      uid: field.uuid(),
      note: field.text(),
    },
  });

  expect(builder.construct(Preset, "preset")).toEqual({
    flag: true,
    count: 42,
    ratio: 3.5,
    amount: "12.50",
    born: new Date(Date.UTC(1990, 4, 12)),
    login: new Date(Date.UTC(2026, 0, 2, 3, 4, 5)),
    alarm: { hour: 7, minute: 30, second: 0, microsecond: 250000 },
    uid: "123e4567-e89b-12d3-a456-426614174000",
    note: "hello",
  });
});

test("constant outside the field pattern becomes null without raising", () => {
  const builder = new Builder();
  const Direction = builder.register({
    name: "Direction",
    template: "(go<direction=up>|drop<direction=sideways>)",
    fields: { direction: field.optional(field.text({ pattern: "up|down" })) },
  });

  expect(builder.construct(Direction, "go")).toEqual({ direction: "up" });
  expect(builder.construct(Direction, "drop")).toEqual({ direction: null });
});

test("conditional constants follow the branch that matched", () => {
  const { builder, Order } = ordersBuilder();

  expect(builder.match("<Order>", "order 10 shipped")?.get(Order)).toEqual({ id: 10, status: "shipped" });
  expect(builder.match("<Order>", "order 11 cancelled")?.get(Order)).toEqual({
    id: 11,
    status: "cancelled",
  });
});

test("escaped > inside a constant is kept in the value", () => {
  const builder = new Builder();
  const Note = builder.register({
    name: "Note",
    template: String.raw`literal<text=3 \> 2>`,
    fields: { text: field.text() },
  });

  expect(builder.match("<Note>", "literal")?.get(Note)).toEqual({ text: "3 > 2" });
});

test("constant of a token-typed field builds the nested record", () => {
  const builder = new Builder();
  const Point = builder.register({
    name: "Point",
    template: "<x>,<y>",
    fields: { x: field.integer(), y: field.integer() },
  });
  const Box = builder.register({
    name: "Box",
    template: "box<origin=1,2>",
    fields: { origin: field.token(Point) },
  });

  const box = builder.construct(Box, "box");
  expect(box).toEqual({ origin: { x: 1, y: 2 } });
  expect(box && Point.accepts(box.origin)).toBe(true);
});

test("nested token fields rebuild their records", () => {
  const builder = new Builder();
  const Point = builder.register({
    name: "Point",
    template: String.raw`\(<x>,\s*<y>\)`,
    fields: { x: field.integer(), y: field.integer() },
  });
  const Segment = builder.register({
    name: "Segment",
    template: "<start> -> <end>",
    fields: { start: field.token(Point), end: field.token(Point) },
  });

  const match = builder.match("<Segment>", "(1, 2) -> (3,4)");
  expect(match?.get(Segment)).toEqual({ start: { x: 1, y: 2 }, end: { x: 3, y: 4 } });
  expect(match?.get(Point, 2)).toEqual({ x: 3, y: 4 });
});

test("defaults fill fields the match or the template leaves out", () => {
  const builder = new Builder();
  const Settings = builder.register({
    name: "Settings",
    template: "mode=<mode>(?:;retries=<retries>)?",
    fields: {
      mode: field.text({ pattern: "[a-z]+" }),
      retries: field.withDefault(field.integer(), 3),
      verbose: field.withDefault(field.boolean(), false),
    },
  });

  expect(builder.match("<Settings>", "mode=fast")?.get(Settings)).toEqual({
    mode: "fast",
    retries: 3,
    verbose: false,
  });
  expect(builder.match("<Settings>", "mode=slow;retries=9")?.get(Settings)).toEqual({
    mode: "slow",
    retries: 9,
    verbose: false,
  });
});

test("custom create builds the caller's record type", () => {
  class Money {
    constructor(
      readonly amount: string,
      readonly currency: string,
    ) {}
  }

  const builder = new Builder();
  const MoneyToken = builder.register({
    name: "Money",
    template: "<amount> <currency>",
    fields: { amount: field.decimal(), currency: field.text({ pattern: "[A-Z]{3}" }) },
    create: (values) => new Money(values.amount, values.currency),
  });

  const money = builder.construct(MoneyToken, "12.00 EUR");
  expect(money).toBeInstanceOf(Money);
  expect(money?.amount).toBe("12.00");
  expect(builder.render(MoneyToken, new Money("3.5", "USD"))).toBe("3.5 USD");
});

test("text the field pattern accepts but the parser rejects raises", () => {
  const builder = new Builder();
  const Day = builder.register({
    name: "Day",
    template: "on <day>",
    fields: { day: field.date() },
  });

  const match = builder.match("<Day>", "on 2025-02-30");
  expect(() => match?.get(Day)).toThrow(ReconstructionError);
  expect(() => match?.get(Day)).toThrow('Field "day" of token Day cannot parse "2025-02-30"');
});

test("subtype occurrences count only the sites that matched as that subtype", () => {
  const { builder, Pair, Coordinate, Complex } = shapesBuilder();
  const match = builder.match("<Pair>; <Pair>", "1 + 2i; x=3, y=4");

  expect(match?.get(Coordinate)).toEqual({ x: 3, y: 4 });
  expect(match?.spanOf(Coordinate)).toEqual([8, 16]);
  expect(match?.get(Coordinate, 2)).toBeNull();
  expect(match?.get(Complex)).toEqual({ x: 1, y: 2 });
  expect(match?.get(Pair, 2)).toEqual({ x: 3, y: 4 });
  expect(() => match?.get(Coordinate, 3)).toThrow(UnknownOccurrenceError);
});

test("fields in repeated clauses keep the last iteration that set them", () => {
  const builder = new Builder();
  const Limit = builder.register({
    name: "Limit",
    template: String.raw`^(\s*(minX\s+<minX>|maxX\s+<maxX>|minY\s+<minY>|maxY\s+<maxY>))*\s*$`,
    fields: {
      minX: field.optional(field.float()),
      maxX: field.optional(field.float()),
      minY: field.optional(field.float()),
      maxY: field.optional(field.float()),
    },
  });
  const limit = (text: string) => builder.construct(Limit, text);

  expect(limit("minX 3 maxX 18")).toEqual({ minX: 3, maxX: 18, minY: null, maxY: null });
  expect(limit("maxX 18 minX 3")).toEqual({ minX: 3, maxX: 18, minY: null, maxY: null });
  expect(limit("minY 80 maxY 100 maxX 18")).toEqual({ minX: null, maxX: 18, minY: 80, maxY: 100 });
  expect(limit("maxX 17 maxX 18")).toEqual({ minX: null, maxX: 18, minY: null, maxY: null });
  expect(limit("minX 1 minX 2 maxX 3")).toEqual({ minX: 2, maxX: 3, minY: null, maxY: null });
  expect(limit("")).toEqual({ minX: null, maxX: null, minY: null, maxY: null });
  expect(limit("minX three")).toBeNull();
});

test("dates before year 100 read back as written", () => {
  const builder = new Builder();
  const Day = builder.register({ name: "Day", template: "on <on>", fields: { on: field.date() } });
  const early = new Date(0);
  early.setUTCFullYear(50, 0, 1);

  const text = builder.render(Day, { on: early });
  expect(text).toBe("on 0050-01-01");
  expect(builder.construct(Day, text)?.on.getUTCFullYear()).toBe(50);
});
