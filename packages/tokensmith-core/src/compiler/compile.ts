import { CompileCycleError, ReconstructionError, TemplateSyntaxError } from "../errors.ts";
import { describeFieldType } from "../fields/field.ts";
import { reconstructSlot, viewOfMatch } from "../reconstruct/reconstruct.ts";
import { DEFAULT_LIST_SEPARATOR, isSameOrSubtype, lineageOf } from "../registry/registry.ts";
import type { TokenRegistry } from "../registry/registry.ts";
import type { FieldDefinition, TokenDefinition } from "../registry/types.ts";
import { hasBackReference, shiftGroups, stripCaptures } from "../template/groups.ts";
import {
  tokenizeTemplate,
  unterminatedPlaceholder,
  type PlaceholderPart,
  type TemplatePart,
} from "../template/syntax.ts";
import type {
  Binding,
  CompiledProgram,
  FieldProgram,
  FieldSlot,
  OccurrenceSite,
  RecordNode,
  RootElement,
  TokenNode,
  UserGroup,
} from "./types.ts";
import { firstGroupOf } from "./types.ts";

const SUPPORTED_FLAGS = "imsuv";

type Emitted = string | { kind: "backref"; locals: readonly number[]; index: number; raw: string };

type CompileState = {
  registry: TokenRegistry;
  flags: string;
  parts: Emitted[];
  /** Capture groups allocated so far; the next group is `groups + 1`. */
  groups: number;
  /** Tokens and aliases currently being expanded, outermost first. */
  stack: string[];
  sites: TokenNode[];
};

type Scope = {
  /** Token whose fields `<field>` placeholders refer to. */
  token: TokenDefinition | null;
  record: RecordNode | null;
  /** Tokens whose aliases apply, innermost first. */
  aliasOwners: readonly TokenDefinition[];
  /** Groups opened by the template being expanded, in order, for back-references. */
  locals: number[];
  multiBound: ReadonlySet<string>;
  onSite: ((node: TokenNode) => void) | null;
  userGroups: UserGroup[] | null;
};

/** Expands `template` against `registry` into an engine pattern plus its group map. */
export function compileProgram(
  registry: TokenRegistry,
  template: string,
  flags = "",
): CompiledProgram {
  validateFlags(flags);
  const state = createState(registry, flags, []);
  const userGroups: UserGroup[] = [];
  const rootTokens: TokenNode[] = [];

  emitTemplate(state, template, {
    token: null,
    record: null,
    aliasOwners: [],
    locals: [],
    multiBound: new Set(),
    onSite: (node) => rootTokens.push(node),
    userGroups,
  });

  const source = finish(state);
  assertEngineAgrees(source, flags, state.groups);
  const occurrences = indexOccurrences(state.sites);

  return {
    template,
    flags,
    source,
    groupCount: state.groups,
    userGroups,
    roots: orderRoots(rootTokens, userGroups, occurrences),
    occurrences,
  };
}

/** Compiles one field on its own, with group numbers starting at 1. */
export function compileFieldProgram(
  registry: TokenRegistry,
  field: FieldDefinition,
  flags: string,
  stack: readonly string[],
): FieldProgram {
  const state = createState(registry, flags, [...stack]);
  const bindings = expandField(state, field, fieldPatternScope([], null));
  const source = finish(state);
  assertEngineAgrees(source, flags, state.groups);
  return { source, groupCount: state.groups, slot: { field, bindings } };
}

function createState(registry: TokenRegistry, flags: string, stack: string[]): CompileState {
  return { registry, flags, parts: [], groups: 0, stack, sites: [] };
}

function validateFlags(flags: string): void {
  for (const flag of flags) {
    if (!SUPPORTED_FLAGS.includes(flag)) {
      throw new TemplateSyntaxError(
        `Unsupported flag "${flag}"; use any of "${SUPPORTED_FLAGS}" (g, y and d are managed by the matcher).`,
      );
    }
  }
}

function emitTemplate(state: CompileState, source: string, scope: Scope): void {
  const parts = tokenizeTemplate(source);
  const repeats: PendingRepeat[] = [];

  for (let index = 0; index < parts.length; index += 1) {
    const part = parts[index];
    if (!part) {
      continue;
    }

    const repeat = repeats[repeats.length - 1];
    if (part.kind === "quantifier" && repeat?.close === index - 1 && scope.record) {
      repeats.pop();
      const body = joinParts(state.parts.slice(repeat.partsStart));
      state.parts.push(part.value, ")");
      if (!hasBackReference(body)) {
        scope.record.repeats.push({
          group: repeat.group,
          first: repeat.groupsStart + 1,
          last: state.groups,
          body: new RegExp(body, `${state.flags}dy`),
        });
      }
      continue;
    }

    if (part.kind === "open" && scope.record) {
      const opened = openRepeat(state, parts, index);
      if (opened) {
        repeats.push(opened);
      }
    }

    if (part.kind === "placeholder") {
      const quantified = part.closed && parts[index + 1]?.kind === "quantifier";
      if (quantified) {
        state.parts.push("(?:");
      }
      expandPlaceholder(state, part, scope, source);
      if (quantified) {
        state.parts.push(")");
      }
      continue;
    }

    if (part.kind === "open" && part.capturing) {
      const group = allocateGroup(state);
      scope.locals.push(group);
      scope.userGroups?.push({ index: scope.userGroups.length + 1, group, name: part.name });
      state.parts.push(part.value);
      continue;
    }

    if (part.kind === "backref") {
      state.parts.push({ kind: "backref", locals: scope.locals, index: part.index, raw: part.value });
      continue;
    }

    state.parts.push(part.value);
  }
}

type PendingRepeat = {
  /** Index of the part closing the repeated group. */
  close: number;
  group: number;
  partsStart: number;
  groupsStart: number;
};

// A repeated group that binds fields gets a capture around all of its iterations; captures inside
// it only hold the last iteration, so reconstruction matches each iteration again.
function openRepeat(state: CompileState, parts: readonly TemplatePart[], open: number): PendingRepeat | null {
  const close = matchingClose(parts, open);
  const quantifier = close < 0 ? undefined : parts[close + 1];
  if (quantifier?.kind !== "quantifier" || !repeatsMoreThanOnce(quantifier.value)) {
    return null;
  }
  if (!parts.slice(open, close).some((part) => part.kind === "placeholder" && part.closed)) {
    return null;
  }

  const group = allocateGroup(state);
  state.parts.push("(");
  return { close, group, partsStart: state.parts.length, groupsStart: state.groups };
}

function matchingClose(parts: readonly TemplatePart[], open: number): number {
  let depth = 0;
  for (let index = open; index < parts.length; index += 1) {
    const kind = parts[index]?.kind;
    if (kind === "open") {
      depth += 1;
    } else if (kind === "close") {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }
  return -1;
}

function repeatsMoreThanOnce(quantifier: string): boolean {
  const parsed = /^(?:([*+])|\{(\d+)(?:(,)(\d*))?\})\??$/.exec(quantifier);
  if (!parsed) {
    return false;
  }
  if (parsed[1] !== undefined) {
    return true;
  }
  const exact = Number(parsed[2]);
  if (parsed[3] === undefined) {
    return exact > 1;
  }
  return parsed[4] === "" || Number(parsed[4]) > 1;
}

function expandPlaceholder(
  state: CompileState,
  part: PlaceholderPart,
  scope: Scope,
  template: string,
): void {
  const field = scope.token?.fields.get(part.name);

  if (!part.closed) {
    const resolves =
      field !== undefined ||
      findAlias(state.registry, scope.aliasOwners, part.name) !== undefined ||
      state.registry.has(part.name);
    if (resolves) {
      throw unterminatedPlaceholder(part, template);
    }
    state.parts.push(part.value);
    return;
  }

  if (part.assignment !== null) {
    if (!field || !scope.record) {
      state.parts.push(escapeLiteral(part.value));
      return;
    }
    const marker = scope.multiBound.has(field.name) ? allocateGroup(state) : null;
    if (marker !== null) {
      state.parts.push("()");
    }
    bind(scope.record, field, {
      kind: "constant",
      literal: part.assignment,
      value: convertConstant(state, field, part.assignment),
      marker,
    });
    return;
  }

  if (field && scope.record) {
    const record = scope.record;
    for (const binding of expandField(state, field, scope)) {
      bind(record, field, binding);
    }
    return;
  }

  const alias = findAlias(state.registry, scope.aliasOwners, part.name);
  if (alias !== undefined) {
    withFrame(state, `<${part.name}>`, () => {
      emitTemplate(state, alias, { ...scope, locals: [], userGroups: null });
    });
    return;
  }

  const definition = state.registry.find(part.name);
  if (!definition) {
    state.parts.push(escapeLiteral(part.value));
    return;
  }

  if (scope.token && definition !== scope.token && isSameOrSubtype(scope.token, definition)) {
    // A subtype's template may spell out its supertype's template; its fields bind to the subtype.
    withFrame(state, `${scope.token.name}:${definition.name}`, () => {
      emitTemplate(state, definition.template, {
        ...scope,
        aliasOwners: [...scope.aliasOwners, definition],
        locals: [],
      });
    });
    return;
  }

  const node = expandTokenReference(state, definition);
  scope.onSite?.(node);
}

function expandField(state: CompileState, field: FieldDefinition, scope: Scope): Binding[] {
  if (field.type.kind === "list") {
    return [expandList(state, field, field.type.element)];
  }

  if (field.type.kind === "token") {
    const declared = state.registry.lookup(field.type.token);
    const nested: TokenNode[] = [];
    emitTemplate(state, field.pattern, fieldPatternScope(scope.aliasOwners, (node) => nested.push(node)));
    const candidates = nested.filter((node) => isSameOrSubtype(node.token, declared));
    if (candidates.length === 0) {
      throw new TemplateSyntaxError(
        `Pattern of field "${field.name}" must reference <${declared.name}>: ${field.pattern}`,
      );
    }
    return candidates.map((node) => ({ kind: "nested", node }));
  }

  const group = allocateGroup(state);
  state.parts.push("(");
  emitTemplate(state, field.pattern, fieldPatternScope(scope.aliasOwners, null));
  state.parts.push(")");
  return [{ kind: "capture", group }];
}

function expandList(
  state: CompileState,
  field: FieldDefinition,
  element: FieldDefinition["type"],
): Binding {
  const repeat = field.repeat ?? { separator: DEFAULT_LIST_SEPARATOR, required: false, empty: null };
  const itemField: FieldDefinition = {
    name: field.name,
    type: element,
    pattern: field.pattern,
    optional: false,
    hasDefault: false,
    defaultValue: undefined,
    repeat: element.kind === "list" ? repeat : null,
  };
  const item = compileFieldProgram(state.registry, itemField, state.flags, state.stack);
  const separator = stripCaptures(repeat.separator);
  const empty = repeat.empty === null ? "" : `(?:${stripCaptures(repeat.empty)})|`;

  const group = allocateGroup(state);
  const first = copyItem(state, item);
  const rest = copyItem(state, item);
  const items = `(?:${first})(?:(?:${separator})(?:${rest}))*`;
  state.parts.push(`((?:${empty}${items})${repeat.required ? "" : "?"})`);

  return {
    kind: "list",
    group,
    item,
    itemPattern: buildPattern(
      `(?:${item.source})(?=(?:${separator})|(?![\\s\\S]))`,
      `${state.flags}dy`,
      field,
    ),
    separatorPattern: buildPattern(`(?:${separator})`, `${state.flags}y`, field),
    emptyPattern:
      repeat.empty === null ? null : buildPattern(`^(?:${repeat.empty})$`, state.flags, field),
  };
}

// Item captures are re-read by the item pattern, so a copy keeps its groups only when its own
// back-references need them.
function copyItem(state: CompileState, item: FieldProgram): string {
  if (!hasBackReference(item.source)) {
    return stripCaptures(item.source);
  }
  const offset = state.groups;
  state.groups += item.groupCount;
  return shiftGroups(item.source, offset);
}

function expandTokenReference(state: CompileState, definition: TokenDefinition): TokenNode {
  const alternatives = state.registry.alternativesOf(definition);

  const node = withFrame(state, definition.name, (): TokenNode => {
    if (alternatives.length === 1) {
      return buildRecord(state, definition);
    }

    state.parts.push("(?:");
    const records = alternatives.map((alternative, index) => {
      if (index > 0) {
        state.parts.push("|");
      }
      return alternative === definition
        ? buildRecord(state, alternative)
        : withFrame(state, alternative.name, () => buildRecord(state, alternative));
    });
    state.parts.push(")");
    return { kind: "polymorphic", token: definition, alternatives: records };
  });

  state.sites.push(node);
  return node;
}

function buildRecord(state: CompileState, definition: TokenDefinition): RecordNode {
  const record: RecordNode = {
    kind: "record",
    token: definition,
    group: allocateGroup(state),
    slots: new Map(
      [...definition.fields.values()].map((field) => [field.name, { field, bindings: [] }]),
    ),
    repeats: [],
  };

  state.parts.push("(");
  emitTemplate(state, definition.template, {
    token: definition,
    record,
    aliasOwners: [definition],
    locals: [],
    multiBound: multiBoundFields(state.registry, definition),
    onSite: null,
    userGroups: null,
  });
  state.parts.push(")");

  for (const slot of record.slots.values()) {
    if (slot.bindings.length === 0 && !slot.field.optional && !slot.field.hasDefault) {
      throw new TemplateSyntaxError(
        `Template of token ${definition.name} never binds required field "${slot.field.name}".`,
      );
    }
  }

  return record;
}

function convertConstant(state: CompileState, field: FieldDefinition, literal: string): unknown {
  const program = compileFieldProgram(state.registry, field, state.flags, state.stack);
  const pattern = buildPattern(`^(?:${program.source})$`, `${state.flags}d`, field);
  const match = pattern.exec(literal);
  if (!match) {
    return null;
  }

  try {
    return reconstructSlot(viewOfMatch(match), program.slot);
  } catch (error) {
    if (error instanceof ReconstructionError) {
      return null;
    }
    throw error;
  }
}

function fieldPatternScope(
  aliasOwners: readonly TokenDefinition[],
  onSite: ((node: TokenNode) => void) | null,
): Scope {
  return {
    token: null,
    record: null,
    aliasOwners,
    locals: [],
    multiBound: new Set(),
    onSite,
    userGroups: null,
  };
}

function bind(record: RecordNode, field: FieldDefinition, binding: Binding): void {
  const slot: FieldSlot | undefined = record.slots.get(field.name);
  if (slot) {
    slot.bindings.push(binding);
  }
}

function allocateGroup(state: CompileState): number {
  state.groups += 1;
  return state.groups;
}

function withFrame<T>(state: CompileState, frame: string, run: () => T): T {
  const start = state.stack.indexOf(frame);
  if (start >= 0) {
    throw new CompileCycleError([...state.stack.slice(start), frame]);
  }
  state.stack.push(frame);
  try {
    return run();
  } finally {
    state.stack.pop();
  }
}

function findAlias(
  registry: TokenRegistry,
  owners: readonly TokenDefinition[],
  name: string,
): string | undefined {
  for (const owner of owners) {
    const alias = owner.aliases.get(name);
    if (alias !== undefined) {
      return alias;
    }
  }
  return registry.alias(name);
}

// Fields placed in more than one spot of a token's template (directly, through aliases or an
// inlined supertype template) get branch markers for their constant assignments.
function multiBoundFields(registry: TokenRegistry, definition: TokenDefinition): Set<string> {
  const counts = new Map<string, number>();
  const visited = new Set<string>();

  const visit = (source: string, owners: readonly TokenDefinition[]): void => {
    for (const part of tokenizeTemplate(source)) {
      if (part.kind !== "placeholder" || !part.closed) {
        continue;
      }
      if (definition.fields.has(part.name)) {
        counts.set(part.name, (counts.get(part.name) ?? 0) + 1);
        continue;
      }
      if (part.assignment !== null) {
        continue;
      }
      const alias = findAlias(registry, owners, part.name);
      if (alias !== undefined) {
        if (!visited.has(`<${part.name}>`)) {
          visited.add(`<${part.name}>`);
          visit(alias, owners);
        }
        continue;
      }
      const inherited = registry.find(part.name);
      if (
        inherited &&
        inherited !== definition &&
        isSameOrSubtype(definition, inherited) &&
        !visited.has(inherited.name)
      ) {
        visited.add(inherited.name);
        visit(inherited.template, [...owners, inherited]);
      }
    }
  };

  visit(definition.template, [definition]);
  return new Set([...counts].filter(([, count]) => count > 1).map(([name]) => name));
}

// Unresolved placeholders are copied through; `\>` has no meaning to the engine under `u`.
function escapeLiteral(value: string): string {
  return value.replace(/\\([\s\S])/g, (whole, character: string) =>
    character === ">" ? ">" : whole,
  );
}

function finish(state: CompileState): string {
  return joinParts(state.parts);
}

function joinParts(parts: readonly Emitted[]): string {
  return parts
    .map((part) => {
      if (typeof part === "string") {
        return part;
      }
      const group = part.locals[part.index - 1];
      return group === undefined ? part.raw : `(?:\\${group})`;
    })
    .join("");
}

function buildPattern(source: string, flags: string, field: FieldDefinition): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TemplateSyntaxError(
      `Pattern of field "${field.name}" (${describeFieldType(field.type)}) is invalid: ${message}`,
      { cause: error },
    );
  }
}

function assertEngineAgrees(source: string, flags: string, groups: number): void {
  let probe: RegExp;
  try {
    probe = new RegExp(`(?:${source})|`, flags);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TemplateSyntaxError(`Expanded pattern is invalid: ${message}`, { cause: error });
  }

  // An alternation with an empty branch always matches, so the result exposes every group.
  const engineGroups = (probe.exec("")?.length ?? 1) - 1;
  if (engineGroups !== groups) {
    throw new TemplateSyntaxError(
      `Expanded pattern has ${engineGroups} groups where ${groups} were allocated: ${source}`,
    );
  }
}

function indexOccurrences(sites: readonly TokenNode[]): Map<string, OccurrenceSite[]> {
  const index = new Map<string, OccurrenceSite[]>();
  const ordered = [...sites].sort((left, right) => firstGroupOf(left) - firstGroupOf(right));

  for (const node of ordered) {
    const records = node.kind === "record" ? [node] : node.alternatives;
    const classes = new Set<TokenDefinition>();
    for (const record of records) {
      for (const definition of lineageOf(record.token)) {
        classes.add(definition);
      }
    }
    for (const definition of classes) {
      const list = index.get(definition.name) ?? [];
      list.push({ node, token: definition });
      index.set(definition.name, list);
    }
  }

  return index;
}

function orderRoots(
  tokens: readonly TokenNode[],
  userGroups: readonly UserGroup[],
  occurrences: ReadonlyMap<string, readonly OccurrenceSite[]>,
): RootElement[] {
  const elements: Array<{ position: number; element: RootElement }> = [];

  for (const node of tokens) {
    const sites = (occurrences.get(node.token.name) ?? []).filter((site) =>
      isSameOrSubtype(site.node.token, site.token),
    );
    const occurrence = sites.findIndex((site) => site.node === node) + 1;
    elements.push({ position: firstGroupOf(node), element: { kind: "token", node, occurrence } });
  }
  for (const group of userGroups) {
    elements.push({ position: group.group, element: { kind: "group", group } });
  }

  return elements.sort((left, right) => left.position - right.position).map(({ element }) => element);
}
