import {
  DuplicateTokenError,
  InvalidSubtypeLinkError,
  MissingFieldPatternError,
  ReconstructionError,
  RegistrationError,
  UnknownTokenError,
} from "../errors.ts";
import { CONVERTERS } from "../fields/converters.ts";
import type { FieldMap, FieldSpec, FieldType, InferFields, TokenType } from "../fields/field.ts";
import { describeFieldType } from "../fields/field.ts";
import { isIdentifier } from "../template/syntax.ts";
import type { FieldDefinition, ResolvedRepeat, TokenDefinition, TokenInput } from "./types.ts";

export const DEFAULT_LIST_SEPARATOR = String.raw`\s*,\s*`;

/**
 * Namespace of tokens. Registration is a write phase: it must not interleave with compilation
 * against the same registry. Every mutation bumps `revision`, which invalidates cached patterns.
 */
export class TokenRegistry {
  private readonly tokens = new Map<string, TokenDefinition>();
  private readonly subtypes = new Map<string, TokenDefinition[]>();
  private readonly builderAliases = new Map<string, string>();
  private readonly origins = new WeakMap<object, TokenDefinition>();
  private mutations = 0;

  get revision(): number {
    return this.mutations;
  }

  get size(): number {
    return this.tokens.size;
  }

  register<
    F extends FieldMap,
    V extends object = Record<never, never>,
    R extends object = V & InferFields<F>,
  >(
    input: TokenInput<F, V, R>,
  ): TokenType<R, V & InferFields<F>> {
    const name = input.name;
    if (!isIdentifier(name)) {
      throw new RegistrationError(`Token name must be an identifier: "${name}"`);
    }
    if (this.tokens.has(name)) {
      throw new DuplicateTokenError(name);
    }

    const supertype = this.resolveSupertype(name, input.extends);
    const fields = new Map<string, FieldDefinition>(supertype?.fields ?? []);
    for (const [fieldName, spec] of Object.entries(input.fields)) {
      if (!isIdentifier(fieldName)) {
        throw new RegistrationError(`Field name of token ${name} must be an identifier: "${fieldName}"`);
      }
      fields.set(fieldName, this.resolveField(name, fieldName, spec, supertype?.fields.get(fieldName)));
    }

    const template = input.template ?? defaultTemplate(name, fields);
    const fieldNames = [...fields.keys()];
    const build = input.create;
    const origins = this.origins;
    const isRecord = (value: unknown): value is R =>
      typeof value === "object" && value !== null && this.isRecordOf(value, definition);

    const handle: TokenType<R, V & InferFields<F>> = { name, accepts: isRecord };
    const definition: TokenDefinition = {
      name,
      template,
      fields,
      supertype,
      aliases: new Map(Object.entries(input.aliases ?? {})),
      create: (values) => {
        if (!hasFieldValues<V & InferFields<F>>(values, fieldNames)) {
          throw new ReconstructionError(`Token ${name} was reconstructed without all of its fields.`);
        }
        const record = build ? build(values) : values;
        origins.set(record, definition);
        return record;
      },
      sequence: this.tokens.size,
      handle,
    };

    this.tokens.set(name, definition);
    if (supertype) {
      const siblings = this.subtypes.get(supertype.name) ?? [];
      siblings.push(definition);
      this.subtypes.set(supertype.name, siblings);
    }
    this.mutations += 1;
    return handle;
  }

  setAlias(name: string, pattern: string): void {
    if (!isIdentifier(name)) {
      throw new RegistrationError(`Alias name must be an identifier: "${name}"`);
    }
    this.builderAliases.set(name, pattern);
    this.mutations += 1;
  }

  alias(name: string): string | undefined {
    return this.builderAliases.get(name);
  }

  has(name: string): boolean {
    return this.tokens.has(name);
  }

  find(name: string): TokenDefinition | undefined {
    return this.tokens.get(name);
  }

  lookup(name: string): TokenDefinition {
    const definition = this.tokens.get(name);
    if (!definition) {
      throw new UnknownTokenError(name);
    }
    return definition;
  }

  /** Direct subtypes in registration order. */
  subtypesOf(definition: TokenDefinition): readonly TokenDefinition[] {
    return this.subtypes.get(definition.name) ?? [];
  }

  /**
   * Alternatives a `<NAME>` reference expands to: every transitive subtype, deeper inheritance
   * first and registration order among equals, then the token itself.
   */
  alternativesOf(definition: TokenDefinition): TokenDefinition[] {
    const collected: TokenDefinition[] = [];
    const pending = [...this.subtypesOf(definition)];
    while (pending.length > 0) {
      const next = pending.shift();
      if (!next) {
        break;
      }
      collected.push(next);
      pending.push(...this.subtypesOf(next));
    }
    collected.sort(
      (left, right) => depthOf(right) - depthOf(left) || left.sequence - right.sequence,
    );
    collected.push(definition);
    return collected;
  }

  /** True when the record object was reconstructed for `definition` or one of its subtypes. */
  isRecordOf(value: object, definition: TokenDefinition): boolean {
    const origin = this.origins.get(value);
    return origin !== undefined && isSameOrSubtype(origin, definition);
  }

  originOf(value: object): TokenDefinition | undefined {
    return this.origins.get(value);
  }

  private resolveSupertype(
    name: string,
    link: TokenType<unknown, unknown> | string | undefined,
  ): TokenDefinition | null {
    if (link === undefined) {
      return null;
    }
    const supertypeName = typeof link === "string" ? link : link.name;
    const supertype = this.tokens.get(supertypeName);
    if (!supertype || (typeof link !== "string" && supertype.handle !== link)) {
      throw new InvalidSubtypeLinkError(name, supertypeName);
    }
    return supertype;
  }

  private resolveField(
    token: string,
    name: string,
    spec: FieldSpec<unknown>,
    inherited: FieldDefinition | undefined,
  ): FieldDefinition {
    this.assertResolvableType(token, name, spec.type);
    const sameType =
      inherited !== undefined && describeFieldType(inherited.type) === describeFieldType(spec.type);
    const pattern = spec.pattern ?? (sameType ? inherited.pattern : defaultPattern(spec.type));
    if (pattern.length === 0) {
      throw new MissingFieldPatternError(token, name, "the pattern is empty");
    }

    return {
      name,
      type: spec.type,
      pattern,
      optional: spec.optional,
      hasDefault: spec.hasDefault,
      defaultValue: spec.defaultValue,
      repeat: spec.type.kind === "list" ? resolveRepeat(spec) : null,
    };
  }

  private assertResolvableType(token: string, name: string, type: FieldType): void {
    if (type.kind === "list") {
      this.assertResolvableType(token, name, type.element);
      return;
    }
    // A token may name itself; the resulting cycle is reported when a pattern uses it.
    if (type.kind === "token" && type.token !== token && !this.tokens.has(type.token)) {
      throw new MissingFieldPatternError(
        token,
        name,
        `token ${type.token} is not registered in this builder`,
      );
    }
  }
}

function defaultTemplate(name: string, fields: ReadonlyMap<string, FieldDefinition>): string {
  const [only, ...rest] = [...fields.keys()];
  if (only === undefined || rest.length > 0) {
    throw new RegistrationError(
      `Token ${name} needs a template because it has ${fields.size} fields.`,
    );
  }
  return `<${only}>`;
}

export function defaultPattern(type: FieldType): string {
  if (type.kind === "token") {
    return `<${type.token}>`;
  }
  if (type.kind === "list") {
    return defaultPattern(type.element);
  }
  return CONVERTERS[type.kind].pattern;
}

function resolveRepeat(spec: FieldSpec<unknown>): ResolvedRepeat {
  const empty = spec.repeat?.empty;
  return {
    separator: spec.repeat?.separator ?? DEFAULT_LIST_SEPARATOR,
    required: spec.repeat?.required ?? false,
    empty: empty === undefined || empty.length === 0 ? null : empty,
  };
}

function depthOf(definition: TokenDefinition): number {
  let depth = 0;
  for (let current = definition.supertype; current; current = current.supertype) {
    depth += 1;
  }
  return depth;
}

export function isSameOrSubtype(definition: TokenDefinition, ancestor: TokenDefinition): boolean {
  for (let current: TokenDefinition | null = definition; current; current = current.supertype) {
    if (current === ancestor) {
      return true;
    }
  }
  return false;
}

/** The token itself followed by its supertypes, nearest first. */
export function lineageOf(definition: TokenDefinition): TokenDefinition[] {
  const lineage: TokenDefinition[] = [];
  for (let current: TokenDefinition | null = definition; current; current = current.supertype) {
    lineage.push(current);
  }
  return lineage;
}

function hasFieldValues<T extends object>(
  values: Record<string, unknown>,
  names: readonly string[],
): values is Record<string, unknown> & T {
  return names.every((name) => Object.hasOwn(values, name));
}
