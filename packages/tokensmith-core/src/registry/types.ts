import type { FieldMap, FieldType, InferFields, TokenType } from "../fields/field.ts";

export type ResolvedRepeat = {
  separator: string;
  required: boolean;
  empty: string | null;
};

/** Field of a registered token with its pattern resolved. */
export type FieldDefinition = {
  name: string;
  type: FieldType;
  /** Pattern of the field, or of one item for list fields. */
  pattern: string;
  optional: boolean;
  hasDefault: boolean;
  defaultValue: unknown;
  repeat: ResolvedRepeat | null;
};

export type TokenDefinition = {
  name: string;
  template: string;
  /** Inherited fields first, then the token's own. */
  fields: ReadonlyMap<string, FieldDefinition>;
  supertype: TokenDefinition | null;
  aliases: ReadonlyMap<string, string>;
  /** Builds the record object from reconstructed field values. */
  create: (values: Record<string, unknown>) => object;
  /** Registration order within the owning registry. */
  sequence: number;
  handle: TokenType<object>;
};

export type TokenInput<F extends FieldMap, V extends object, R extends object> = {
  /** Token name used in `<NAME>` placeholders. */
  name: string;
  /** Pattern template; defaults to `<field>` when the token has exactly one field. */
  template?: string;
  fields: F;
  /** Supertype handle or name; its fields and patterns are inherited. */
  extends?: TokenType<unknown, V> | string;
  /** Template fragments usable as `<alias>` inside this token's template only. */
  aliases?: Record<string, string>;
  /** Builds the record from reconstructed values (a plain object by default). */
  create?: (values: V & InferFields<F>) => R;
};
