import type { PrimitiveKind, PrimitiveValueMap } from "./converters.ts";

export type FieldType =
  | { kind: PrimitiveKind }
  | { kind: "token"; token: string }
  | { kind: "list"; element: FieldType };

/** Separator, presence and empty-literal settings of a list field. */
export type RepeatOptions = {
  /** Pattern between two items (defaults to `\s*,\s*`). */
  separator?: string;
  /** When `true` the list segment must hold at least one item or the empty literal. */
  required?: boolean;
  /** Pattern that stands for an empty list, e.g. `TBD`. */
  empty?: string;
};

export type FieldOptions = {
  /** Overrides the pattern derived from the field's type. */
  pattern?: string;
};

/**
 * Declared field of a token. `T` is the reconstructed value type; it exists only at the type
 * level and drives the static type of the record returned by `get`.
 */
export type FieldSpec<T> = {
  readonly type: FieldType;
  readonly pattern: string | null;
  readonly optional: boolean;
  readonly hasDefault: boolean;
  readonly defaultValue: unknown;
  readonly repeat: RepeatOptions | null;
  readonly __value?: T;
};

export type FieldMap = Record<string, FieldSpec<unknown>>;

export type InferFields<F extends FieldMap> = {
  [K in keyof F]: F[K] extends FieldSpec<infer T> ? T : never;
};

/** Handle returned by `register`; `R` is the record type, `V` the field values it is built from. */
export type TokenType<R, V = R> = {
  readonly name: string;
  /** True for records reconstructed for this token or one of its subtypes. */
  readonly accepts: (value: unknown) => value is R;
  readonly __values?: V;
};

export type ListOptions = FieldOptions & RepeatOptions;

function spec<T>(type: FieldType, options: FieldOptions = {}): FieldSpec<T> {
  return {
    type,
    pattern: options.pattern ?? null,
    optional: false,
    hasDefault: false,
    defaultValue: undefined,
    repeat: null,
  };
}

function primitive<K extends PrimitiveKind>(kind: K) {
  return (options?: FieldOptions): FieldSpec<PrimitiveValueMap[K]> => spec({ kind }, options);
}

export const field = {
  boolean: primitive("boolean"),
  integer: primitive("integer"),
  float: primitive("float"),
  decimal: primitive("decimal"),
  date: primitive("date"),
  datetime: primitive("datetime"),
  time: primitive("time"),
  uuid: primitive("uuid"),
  text: primitive("text"),
  /** Nested record of another token; accepts the token's handle or its name. */
  token<R>(token: TokenType<R, unknown> | string, options?: FieldOptions): FieldSpec<R> {
    const name = typeof token === "string" ? token : token.name;
    return spec({ kind: "token", token: name }, options);
  },
  /**
   * Repeated field; `options.pattern` overrides the item pattern. Reconstructs to `null` when
   * the list segment did not take part in the match.
   */
  list<T>(element: FieldSpec<T>, options: ListOptions = {}): FieldSpec<T[] | null> {
    return {
      ...spec<T[] | null>({ kind: "list", element: element.type }, {
        pattern: options.pattern ?? element.pattern ?? undefined,
      }),
      repeat: {
        separator: options.separator,
        required: options.required,
        empty: options.empty,
      },
    };
  },
  /** Field that may be absent from a match; reconstructs to `null` then. */
  optional<T>(inner: FieldSpec<T>): FieldSpec<T | null> {
    return { ...inner, optional: true };
  },
  /** Field that falls back to `value` when absent from a match or from the template. */
  withDefault<T>(inner: FieldSpec<T>, value: T): FieldSpec<T> {
    return { ...inner, hasDefault: true, defaultValue: value };
  },
};

export function describeFieldType(type: FieldType): string {
  if (type.kind === "token") {
    return type.token;
  }
  if (type.kind === "list") {
    return `list<${describeFieldType(type.element)}>`;
  }
  return type.kind;
}
