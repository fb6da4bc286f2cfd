import type { FieldDefinition, TokenDefinition } from "../registry/types.ts";

export type CaptureBinding = {
  kind: "capture";
  group: number;
};

export type ConstantBinding = {
  kind: "constant";
  /** Assigned text after `\>` unescaping. */
  literal: string;
  /** Converted value, `null` when the literal did not match the field's pattern. */
  value: unknown;
  /** Empty group marking the branch of a field that is bound more than once, else `null`. */
  marker: number | null;
};

export type ListBinding = {
  kind: "list";
  /** Capture of the whole list segment; `undefined` at match time means the segment is absent. */
  group: number;
  item: FieldProgram;
  /** Sticky item matcher that only stops before a separator or the end of the segment. */
  itemPattern: RegExp;
  separatorPattern: RegExp;
  emptyPattern: RegExp | null;
};

export type NestedBinding = {
  kind: "nested";
  node: TokenNode;
};

export type Binding = CaptureBinding | ConstantBinding | ListBinding | NestedBinding;

export type FieldSlot = {
  field: FieldDefinition;
  /** Every place the template binds the field, in emission order; the first that took part wins. */
  bindings: Binding[];
};

/** A group of the token's template that repeats and binds fields inside its body. */
export type RepeatRegion = {
  /** Capture spanning every iteration. */
  group: number;
  /** First and last group of one iteration; group `first + n - 1` is group `n` of `body`. */
  first: number;
  last: number;
  /** Sticky pattern for a single iteration. */
  body: RegExp;
};

export type RecordNode = {
  kind: "record";
  token: TokenDefinition;
  /** Capture group wrapping the whole token expansion. */
  group: number;
  slots: Map<string, FieldSlot>;
  /** Innermost first. */
  repeats: RepeatRegion[];
};

export type PolymorphicNode = {
  kind: "polymorphic";
  token: TokenDefinition;
  /** One record per alternative, in alternation order. */
  alternatives: RecordNode[];
};

export type TokenNode = RecordNode | PolymorphicNode;

/** Standalone pattern for one field, used for list items and constant assignments. */
export type FieldProgram = {
  source: string;
  groupCount: number;
  slot: FieldSlot;
};

export type OccurrenceSite = {
  node: TokenNode;
  /** Class the site is indexed under; alternatives outside it reconstruct as absent. */
  token: TokenDefinition;
};

export type UserGroup = {
  /** Group number as written in the template. */
  index: number;
  /** Group number in the expanded pattern. */
  group: number;
  name: string | null;
};

export type RootElement =
  | { kind: "token"; node: TokenNode; occurrence: number }
  | { kind: "group"; group: UserGroup };

export type CompiledProgram = {
  template: string;
  flags: string;
  source: string;
  groupCount: number;
  userGroups: UserGroup[];
  /** Top-level tokens and user groups in pattern order. */
  roots: RootElement[];
  occurrences: ReadonlyMap<string, readonly OccurrenceSite[]>;
};

export function firstGroupOf(node: TokenNode): number {
  if (node.kind === "record") {
    return node.group;
  }
  return node.alternatives[0]?.group ?? 0;
}
