import { expect, test } from "vitest";
import {
  Builder,
  DuplicateTokenError,
  InvalidSubtypeLinkError,
  MissingFieldPatternError,
  RegistrationError,
  field,
} from "../src/index.ts";
import { shapesBuilder } from "./fixtures/tokens.ts";

test("register rejects a second token with the same name", () => {
  const builder = new Builder();
  builder.register({ name: "Word", fields: { value: field.text() } });

  expect(() => builder.register({ name: "Word", fields: { value: field.text() } })).toThrow(
    DuplicateTokenError,
  );
});

test("register requires identifier names", () => {
  const builder = new Builder();

  expect(() => builder.register({ name: "bad-name", fields: { value: field.text() } })).toThrow(
    'Token name must be an identifier: "bad-name"',
  );
  expect(() => builder.register({ name: "Good", fields: { "1st": field.text() } })).toThrow(RegistrationError);
});

test("single-field tokens default their template to the field", () => {
  const builder = new Builder();
  builder.register({ name: "Word", fields: { value: field.text({ pattern: "[a-z]+" }) } });

  expect(builder.lookup("Word").template).toBe("<value>");
  expect(() =>
    builder.register({ name: "Pair", fields: { x: field.integer(), y: field.integer() } }),
  ).toThrow("Token Pair needs a template because it has 2 fields.");
});

test("token fields must name a registered token", () => {
  const builder = new Builder();

  expect(() =>
    builder.register({ name: "Car", template: "<owner>", fields: { owner: field.token("Person") } }),
  ).toThrow('Field "owner" of token Car has no pattern: token Person is not registered in this builder');
});

test("empty field patterns are rejected", () => {
  const builder = new Builder();

  expect(() => builder.register({ name: "Blank", fields: { value: field.text({ pattern: "" }) } })).toThrow(
    MissingFieldPatternError,
  );
});

test("supertype handles must come from the same builder", () => {
  const { Pair } = shapesBuilder();
  const builder = new Builder();
  builder.register({ name: "Pair", template: "<x>:<y>", fields: { x: field.integer(), y: field.integer() } });

  expect(() => builder.register({ name: "Polar", extends: Pair, template: "<x>@<y>", fields: {} })).toThrow(
    InvalidSubtypeLinkError,
  );
  expect(() => builder.register({ name: "Other", extends: "Missing", template: "x", fields: {} })).toThrow(
    "Token Other extends Missing, which is not registered in this builder.",
  );
});

test("subtypes inherit fields ahead of their own", () => {
  const { builder } = shapesBuilder();

  expect([...builder.lookup("Coordinate").fields.keys()]).toEqual(["x", "y"]);
  expect([...builder.lookup("Point3D").fields.keys()]).toEqual(["x", "y", "z"]);
  expect(builder.lookup("Point3D").supertype?.name).toBe("Coordinate");
});

test("alternativesOf orders deeper subtypes first and the token itself last", () => {
  const { builder } = shapesBuilder();
  const registry = builder.registry;

  expect(registry.alternativesOf(registry.lookup("Pair")).map((token) => token.name)).toEqual([
    "Point3D",
    "Coordinate",
    "Complex",
    "Pair",
  ]);
  expect(registry.alternativesOf(registry.lookup("Complex")).map((token) => token.name)).toEqual([
    "Complex",
  ]);
});

test("an overriding field of the same type keeps the inherited pattern", () => {
  const builder = new Builder();
  const Base = builder.register({
    name: "Base",
    template: "<code>",
    fields: { code: field.integer({ pattern: String.raw`\d{3}` }) },
  });
  builder.register({ name: "Same", extends: Base, template: "#<code>", fields: { code: field.integer() } });
  builder.register({ name: "Retyped", extends: Base, template: "#<code>", fields: { code: field.text() } });

  expect(builder.lookup("Same").fields.get("code")?.pattern).toBe(String.raw`\d{3}`);
  expect(builder.lookup("Retyped").fields.get("code")?.pattern).toBe(".+?");
});

test("list fields resolve their separator and empty literal", () => {
  const builder = new Builder();
  builder.register({
    name: "Numbers",
    fields: { values: field.list(field.integer(), { empty: "" }) },
  });

  expect(builder.lookup("Numbers").fields.get("values")).toEqual({
    name: "values",
    type: { kind: "list", element: { kind: "integer" } },
    pattern: String.raw`[-+]?\d+`,
    optional: false,
    hasDefault: false,
    defaultValue: undefined,
    repeat: { separator: String.raw`\s*,\s*`, required: false, empty: null },
  });
});

test("every registration bumps the registry revision", () => {
  const builder = new Builder();
  const before = builder.registry.revision;
  builder.register({ name: "Word", fields: { value: field.text() } });
  builder.alias("digits", String.raw`\d+`);

  expect(builder.registry.revision).toBe(before + 2);
  expect(builder.registry.size).toBe(1);
  expect(builder.has("Word")).toBe(true);
  expect(builder.has("digits")).toBe(false);
});
