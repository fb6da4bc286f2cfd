import {
  Builder,
  field,
  isPrimitiveKind,
  parsePrimitive,
  type BuilderOptions,
  type FieldSpec,
} from "@tokensmith/core";
import { z } from "zod";

type FieldInput =
  | string
  | {
      type: string;
      of?: FieldInput;
      pattern?: string;
      optional?: boolean;
      default?: unknown;
      separator?: string;
      required?: boolean;
      empty?: string;
    };

const fieldSchema: z.ZodType<FieldInput> = z.lazy(() =>
  z.union([
    z.string().min(1),
    z
      .object({
        type: z.string().min(1),
        of: fieldSchema.optional(),
        pattern: z.string().optional(),
        optional: z.boolean().optional(),
        default: z.unknown().optional(),
        separator: z.string().optional(),
        required: z.boolean().optional(),
        empty: z.string().optional(),
      })
      .strict(),
  ]),
);

const tokenSchema = z
  .object({
    name: z.string().min(1),
    template: z.string().optional(),
    extends: z.string().optional(),
    aliases: z.record(z.string()).optional(),
    fields: z.record(fieldSchema).default({}),
  })
  .strict();

/** Shape of a token definitions file. */
export const definitionsSchema = z
  .object({
    aliases: z.record(z.string()).default({}),
    tokens: z.array(tokenSchema),
  })
  .strict();

export type DefinitionsInput = z.input<typeof definitionsSchema>;
export type Definitions = z.output<typeof definitionsSchema>;

/** Parses and validates definitions JSON text. */
export function parseDefinitions(text: string): Definitions {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Token definitions are not valid JSON: ${reason}`, { cause: error });
  }

  const parsed = definitionsSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new Error(`Invalid token definitions:\n${issues.join("\n")}`);
  }
  return parsed.data;
}

/** Registers the aliases and tokens of `definitions` in a new builder, in file order. */
export function buildFromDefinitions(definitions: Definitions, options: BuilderOptions = {}): Builder {
  const builder = new Builder(options);
  for (const [name, pattern] of Object.entries(definitions.aliases)) {
    builder.alias(name, pattern);
  }

  for (const token of definitions.tokens) {
    const fields: Record<string, FieldSpec<unknown>> = {};
    for (const [name, input] of Object.entries(token.fields)) {
      fields[name] = toFieldSpec(`${token.name}.${name}`, input);
    }
    builder.register({
      name: token.name,
      template: token.template,
      extends: token.extends,
      aliases: token.aliases,
      fields,
    });
  }

  return builder;
}

function toFieldSpec(location: string, input: FieldInput): FieldSpec<unknown> {
  const options: Exclude<FieldInput, string> = typeof input === "string" ? { type: input } : input;
  let spec: FieldSpec<unknown>;

  if (options.type === "list") {
    if (options.of === undefined) {
      throw new Error(`${location}: list fields need "of".`);
    }
    spec = field.list(toFieldSpec(`${location}[]`, options.of), {
      pattern: options.pattern,
      separator: options.separator,
      required: options.required,
      empty: options.empty,
    });
  } else if (isPrimitiveKind(options.type)) {
    spec = field[options.type]({ pattern: options.pattern });
  } else {
    spec = field.token(options.type, { pattern: options.pattern });
  }

  if (options.optional) {
    spec = field.optional(spec);
  }
  if (options.default !== undefined) {
    spec = field.withDefault(spec, defaultValue(location, options.type, options.default));
  }
  return spec;
}

function defaultValue(location: string, type: string, value: unknown): unknown {
  if (typeof value !== "string" || !isPrimitiveKind(type)) {
    return value;
  }
  try {
    return parsePrimitive(type, value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${location}: invalid default: ${reason}`, { cause: error });
  }
}
