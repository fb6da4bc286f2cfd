import type {
  Binding,
  FieldSlot,
  ListBinding,
  RecordNode,
  RepeatRegion,
  TokenNode,
} from "../compiler/types.ts";
import { ReconstructionError } from "../errors.ts";
import { parsePrimitive } from "../fields/converters.ts";
import { isSameOrSubtype } from "../registry/registry.ts";
import type { TokenDefinition } from "../registry/types.ts";

/** Read access to the captures of one engine match, by expanded group number. */
export type MatchView = {
  input: string;
  text(group: number): string | undefined;
  span(group: number): readonly [number, number] | undefined;
};

export type Reconstructed = {
  token: TokenDefinition;
  value: object;
};

type BindingValue = { present: true; value: unknown } | { present: false };

const ABSENT: BindingValue = { present: false };

export function viewOfMatch(match: RegExpExecArray): MatchView {
  return {
    input: match.input,
    text: (group) => match[group],
    span: (group) => match.indices?.[group],
  };
}

/**
 * Rebuilds the record matched at `node`, or `null` when the site did not take part in the match.
 * With `within`, alternatives that are not `within` or one of its subtypes count as absent.
 */
export function reconstructNode(
  view: MatchView,
  node: TokenNode,
  within?: TokenDefinition,
): Reconstructed | null {
  const record = matchedRecord(view, node);
  if (!record || (within && !isSameOrSubtype(record.token, within))) {
    return null;
  }
  return { token: record.token, value: reconstructRecord(view, record) };
}

/** The record of `node` whose wrapping group took part in the match. */
export function matchedRecord(view: MatchView, node: TokenNode): RecordNode | null {
  const records = node.kind === "record" ? [node] : node.alternatives;
  return records.find((record) => view.text(record.group) !== undefined) ?? null;
}

function reconstructRecord(view: MatchView, record: RecordNode): object {
  const values: Record<string, unknown> = {};
  for (const [name, slot] of record.slots) {
    values[name] = reconstructSlot(lastSettingIteration(view, record, slot) ?? view, slot, record.token);
  }
  return record.token.create(values);
}

// A field bound inside a repeated group takes its value from the last iteration that set it.
function lastSettingIteration(view: MatchView, record: RecordNode, slot: FieldSlot): MatchView | null {
  const groups = slot.bindings.flatMap(groupsOf);
  const repeat = record.repeats.find((region) =>
    groups.some((group) => group >= region.first && group <= region.last),
  );
  if (!repeat) {
    return null;
  }

  const iterations = iterationsOf(view, repeat);
  for (let index = iterations.length - 1; index >= 0; index -= 1) {
    const iteration = iterations[index];
    if (iteration && groups.some((group) => iteration.text(group) !== undefined)) {
      return iteration;
    }
  }
  return null;
}

function iterationsOf(view: MatchView, repeat: RepeatRegion): MatchView[] {
  const span = view.span(repeat.group);
  if (!span) {
    return [];
  }

  const [start, end] = span;
  const iterations: MatchView[] = [];
  let position = start;
  while (position < end) {
    repeat.body.lastIndex = position;
    const iteration = repeat.body.exec(view.input);
    const next = iteration ? iteration.index + iteration[0].length : position;
    if (!iteration || next === position || next > end) {
      break;
    }
    iterations.push(iterationView(view, iteration, repeat));
    position = next;
  }
  return iterations;
}

function iterationView(view: MatchView, iteration: RegExpExecArray, repeat: RepeatRegion): MatchView {
  const inside = (group: number) => group >= repeat.first && group <= repeat.last;
  const local = (group: number) => group - repeat.first + 1;
  return {
    input: view.input,
    text: (group) => (inside(group) ? iteration[local(group)] : view.text(group)),
    span: (group) => (inside(group) ? iteration.indices?.[local(group)] : view.span(group)),
  };
}

function groupsOf(binding: Binding): number[] {
  switch (binding.kind) {
    case "capture":
    case "list":
      return [binding.group];
    case "constant":
      return binding.marker === null ? [] : [binding.marker];
    case "nested":
      return binding.node.kind === "record"
        ? [binding.node.group]
        : binding.node.alternatives.map((record) => record.group);
  }
}

/** Value of one field: its first binding that took part, else its default. */
export function reconstructSlot(view: MatchView, slot: FieldSlot, owner?: TokenDefinition): unknown {
  for (const binding of slot.bindings) {
    const bound = bindingValue(view, slot, binding, owner);
    if (bound.present) {
      return bound.value;
    }
  }

  const field = slot.field;
  if (field.hasDefault) {
    return Array.isArray(field.defaultValue) ? [...field.defaultValue] : field.defaultValue;
  }
  if (field.optional || field.type.kind === "list") {
    return null;
  }
  throw new ReconstructionError(
    `Field "${field.name}"${describeOwner(owner)} is required but did not take part in the match.`,
  );
}

function bindingValue(
  view: MatchView,
  slot: FieldSlot,
  binding: Binding,
  owner: TokenDefinition | undefined,
): BindingValue {
  switch (binding.kind) {
    case "constant":
      if (binding.marker !== null && view.text(binding.marker) === undefined) {
        return ABSENT;
      }
      return { present: true, value: binding.value };
    case "nested": {
      const nested = reconstructNode(view, binding.node);
      return nested ? { present: true, value: nested.value } : ABSENT;
    }
    case "list": {
      const segment = view.text(binding.group);
      if (segment === undefined) {
        return ABSENT;
      }
      return { present: true, value: reconstructList(segment, slot, binding, owner) };
    }
    case "capture": {
      const text = view.text(binding.group);
      if (text === undefined) {
        return ABSENT;
      }
      return { present: true, value: parseCapture(text, slot, owner) };
    }
  }
}

function parseCapture(text: string, slot: FieldSlot, owner: TokenDefinition | undefined): unknown {
  const { field } = slot;
  if (field.type.kind === "token" || field.type.kind === "list") {
    throw new ReconstructionError(
      `Field "${field.name}"${describeOwner(owner)} is bound to a plain capture.`,
    );
  }

  try {
    return parsePrimitive(field.type.kind, text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReconstructionError(
      `Field "${field.name}"${describeOwner(owner)} cannot parse ${JSON.stringify(text)}: ${reason}`,
      { cause: error },
    );
  }
}

// The segment was matched as a whole; items are found again one by one with the item program.
function reconstructList(
  segment: string,
  slot: FieldSlot,
  binding: ListBinding,
  owner: TokenDefinition | undefined,
): unknown[] {
  if (segment.length === 0 || binding.emptyPattern?.test(segment)) {
    return [];
  }

  const items: unknown[] = [];
  let position = 0;

  for (;;) {
    binding.itemPattern.lastIndex = position;
    const item = binding.itemPattern.exec(segment);
    if (!item) {
      throw listError(slot, owner, segment, position);
    }
    items.push(reconstructSlot(viewOfMatch(item), binding.item.slot, owner));
    position = item.index + item[0].length;
    if (position >= segment.length) {
      return items;
    }

    binding.separatorPattern.lastIndex = position;
    const separator = binding.separatorPattern.exec(segment);
    if (!separator || (separator[0].length === 0 && item[0].length === 0)) {
      throw listError(slot, owner, segment, position);
    }
    position += separator[0].length;
  }
}

function listError(
  slot: FieldSlot,
  owner: TokenDefinition | undefined,
  segment: string,
  position: number,
): ReconstructionError {
  return new ReconstructionError(
    `List field "${slot.field.name}"${describeOwner(owner)} has no item at offset ${position} of ${JSON.stringify(segment)}.`,
  );
}

function describeOwner(owner: TokenDefinition | undefined): string {
  return owner ? ` of token ${owner.name}` : "";
}
