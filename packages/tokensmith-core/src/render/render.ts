import { RenderError } from "../errors.ts";
import { formatPrimitive, parsePrimitive, type PrimitiveKind } from "../fields/converters.ts";
import type { FieldType } from "../fields/field.ts";
import { isSameOrSubtype, type TokenRegistry } from "../registry/registry.ts";
import type { FieldDefinition, TokenDefinition } from "../registry/types.ts";
import { unterminatedPlaceholder, type PlaceholderPart } from "../template/syntax.ts";
import { parseTemplateTree, type Alternation, type TreeItem, type TreeNode } from "./template-tree.ts";

type RenderScope = {
  registry: TokenRegistry;
  /** Token whose fields placeholders refer to; `null` for separators and empty literals. */
  token: TokenDefinition | null;
  record: object | null;
  aliasOwners: readonly TokenDefinition[];
  /** Aliases and inlined templates being rendered. */
  stack: string[];
  /** Field values written so far; optional parts only render when they write one. */
  written: { count: number };
  /** Why the last branch could not be rendered. */
  missing: { reason: string | null };
};

const LOOKAROUND = /^\(\?<?[=!]/;

/** Writes `record` back out through the template of its token (or of `declared`). */
export function renderRecord(registry: TokenRegistry, declared: TokenDefinition, record: unknown): string {
  if (typeof record !== "object" || record === null) {
    throw new RenderError(`Cannot render ${typeof record} as token ${declared.name}.`);
  }

  const origin = registry.originOf(record);
  const token = origin && isSameOrSubtype(origin, declared) ? origin : declared;
  const scope: RenderScope = {
    registry,
    token,
    record,
    aliasOwners: [token],
    stack: [token.name],
    written: { count: 0 },
    missing: { reason: null },
  };

  const rendered = renderAlternation(parseTemplateTree(token.template), scope);
  if (rendered === null) {
    throw new RenderError(
      `Token ${token.name} cannot be rendered: ${scope.missing.reason ?? "no branch of its template applies"}.`,
    );
  }
  return rendered;
}

function renderAlternation(alternation: Alternation, scope: RenderScope): string | null {
  for (const branch of alternation) {
    const rendered = renderSequence(branch, scope);
    if (rendered !== null) {
      return rendered;
    }
  }
  return null;
}

function renderSequence(sequence: readonly TreeItem[], scope: RenderScope): string | null {
  let output = "";
  for (const item of sequence) {
    const rendered = renderItem(item, scope);
    if (rendered === null) {
      return null;
    }
    output += rendered;
  }
  return output;
}

function renderItem(item: TreeItem, scope: RenderScope): string | null {
  if (item.min > 0) {
    return renderNode(item.node, scope)?.repeat(item.min) ?? null;
  }

  const before = scope.written.count;
  let rendered: string | null;
  try {
    rendered = renderNode(item.node, scope);
  } catch (error) {
    if (error instanceof RenderError && scope.written.count === before) {
      return "";
    }
    throw error;
  }

  if (rendered === null || scope.written.count === before) {
    scope.written.count = before;
    return "";
  }
  return rendered;
}

function renderNode(node: TreeNode, scope: RenderScope): string | null {
  if (node.kind === "group") {
    return LOOKAROUND.test(node.open) ? "" : renderAlternation(node.body, scope);
  }

  const part = node.part;
  switch (part.kind) {
    case "text":
      return part.value;
    case "escape":
      return renderEscape(part.value);
    case "placeholder":
      return renderPlaceholder(part, scope);
    case "meta":
      if (part.value === ".") {
        throw new RenderError(`"." has no single rendering.`);
      }
      return "";
    case "class":
      throw new RenderError(`Character class ${part.value} has no single rendering.`);
    case "backref":
      throw new RenderError(`Back-reference ${part.value} cannot be rendered.`);
    default:
      return "";
  }
}

function renderEscape(escape: string): string {
  const character = escape.slice(1);
  switch (character) {
    case "s":
      return " ";
    case "n":
      return "\n";
    case "t":
      return "\t";
    case "r":
      return "\r";
    case "b":
    case "B":
      return "";
    case "d":
    case "D":
    case "w":
    case "W":
    case "S":
      throw new RenderError(`Escape ${escape} has no single rendering.`);
    default:
      if (character.startsWith("k<")) {
        throw new RenderError(`Back-reference ${escape} cannot be rendered.`);
      }
      return character;
  }
}

function renderPlaceholder(part: PlaceholderPart, scope: RenderScope): string | null {
  const { token, record } = scope;
  const field = token?.fields.get(part.name);

  if (!part.closed) {
    if (field || findAlias(scope, part.name) !== undefined || scope.registry.has(part.name)) {
      throw unterminatedPlaceholder(part);
    }
    return part.value;
  }

  if (part.assignment !== null) {
    if (!field || !record) {
      return `<${part.name}=${part.assignment}>`;
    }
    if (constantMatches(field, part.assignment, readField(record, field.name))) {
      return "";
    }
    return miss(scope, `field "${field.name}" does not hold ${JSON.stringify(part.assignment)}`);
  }

  if (field && record) {
    const value = readField(record, field.name);
    if (value === null || value === undefined) {
      return miss(scope, `field "${field.name}" has no value`);
    }
    scope.written.count += 1;
    return renderFieldValue(scope.registry, field, field.type, value);
  }

  const alias = findAlias(scope, part.name);
  if (alias !== undefined) {
    return renderNested(scope, `<${part.name}>`, alias, scope.aliasOwners);
  }

  const definition = scope.registry.find(part.name);
  if (definition && token && definition !== token && isSameOrSubtype(token, definition)) {
    return renderNested(scope, definition.name, definition.template, [...scope.aliasOwners, definition]);
  }
  if (definition) {
    throw new RenderError(
      `<${part.name}> is not bound to a field${token ? ` of token ${token.name}` : ""}.`,
    );
  }

  return part.value;
}

function renderNested(
  scope: RenderScope,
  frame: string,
  template: string,
  aliasOwners: readonly TokenDefinition[],
): string | null {
  if (scope.stack.includes(frame)) {
    throw new RenderError(`Template expansion never terminates: ${[...scope.stack, frame].join(" -> ")}`);
  }
  scope.stack.push(frame);
  try {
    return renderAlternation(parseTemplateTree(template), { ...scope, aliasOwners });
  } finally {
    scope.stack.pop();
  }
}

function renderFieldValue(
  registry: TokenRegistry,
  field: FieldDefinition,
  type: FieldType,
  value: unknown,
): string {
  if (type.kind === "token") {
    return renderRecord(registry, registry.lookup(type.token), value);
  }

  if (type.kind === "list") {
    if (!Array.isArray(value)) {
      throw new RenderError(`List field "${field.name}" holds ${typeof value}, not an array.`);
    }
    const repeat = field.repeat;
    if (value.length === 0) {
      return repeat?.empty ? renderStandalone(registry, repeat.empty) : "";
    }
    const separator = repeat ? renderStandalone(registry, repeat.separator) : ",";
    return value.map((item: unknown) => renderFieldValue(registry, field, type.element, item)).join(separator);
  }

  return formatField(field, type.kind, value);
}

function formatField(field: FieldDefinition, kind: PrimitiveKind, value: unknown): string {
  try {
    return formatPrimitive(kind, value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RenderError(`Field "${field.name}" cannot be rendered: ${reason}`, { cause: error });
  }
}

function renderStandalone(registry: TokenRegistry, template: string): string {
  const scope: RenderScope = {
    registry,
    token: null,
    record: null,
    aliasOwners: [],
    stack: [],
    written: { count: 0 },
    missing: { reason: null },
  };
  const rendered = renderAlternation(parseTemplateTree(template), scope);
  if (rendered === null) {
    throw new RenderError(`Pattern ${template} cannot be rendered.`);
  }
  return rendered;
}

function constantMatches(field: FieldDefinition, literal: string, value: unknown): boolean {
  const kind = field.type.kind;
  if (kind === "token" || kind === "list") {
    return value === null || value === undefined;
  }

  let expected: string;
  try {
    expected = formatPrimitive(kind, parsePrimitive(kind, literal));
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    // The constant itself converted to null.
    return value === null || value === undefined;
  }

  try {
    return formatPrimitive(kind, value) === expected;
  } catch (error) {
    if (error instanceof Error) {
      return false;
    }
    throw error;
  }
}

function findAlias(scope: RenderScope, name: string): string | undefined {
  for (const owner of scope.aliasOwners) {
    const alias = owner.aliases.get(name);
    if (alias !== undefined) {
      return alias;
    }
  }
  return scope.registry.alias(name);
}

function readField(record: object, name: string): unknown {
  const value: unknown = Reflect.get(record, name);
  return value;
}

function miss(scope: RenderScope, reason: string): null {
  scope.missing.reason = reason;
  return null;
}
