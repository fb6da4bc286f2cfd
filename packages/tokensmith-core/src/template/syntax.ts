import {
  any,
  anyChar,
  cut,
  eof,
  formatErrorReport,
  many,
  map,
  mapJoin,
  optional,
  regex as parseRegex,
  seq,
  str,
} from "@claudiu-ceia/combine";
import { TemplateSyntaxError } from "../errors.ts";

export type TemplatePart =
  | { kind: "text"; value: string }
  | { kind: "escape"; value: string }
  | { kind: "backref"; value: string; index: number }
  | { kind: "class"; value: string }
  | { kind: "open"; value: string; capturing: boolean; name: string | null }
  | { kind: "close"; value: string }
  | { kind: "alternation"; value: string }
  | { kind: "quantifier"; value: string }
  | { kind: "meta"; value: string }
  | PlaceholderPart;

export type PlaceholderPart = {
  kind: "placeholder";
  /** Source text of the whole placeholder, used when it is copied through unexpanded. */
  value: string;
  name: string;
  /** Unescaped right-hand side of `<name=value>`, `null` for a plain reference. */
  assignment: string | null;
  /** `false` for `<name` that is not followed by `>` or `=`. */
  closed: boolean;
};

const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/;

const identifierParser = parseRegex(IDENTIFIER, "identifier");

const assignmentCharacterParser = any(
  map(str("\\>"), () => ">"),
  parseRegex(/\\[^>]/, "escaped character"),
  parseRegex(/[^>\\]/, "assignment character"),
);

const placeholderEndParser = any(
  map(str(">"), (): { assignment: string | null } => ({ assignment: null })),
  map(
    seq(str("="), cut(seq(mapJoin(many(assignmentCharacterParser)), str(">")), "closing '>'")),
    ([, [assignment]]): { assignment: string | null } => ({ assignment }),
  ),
);

const placeholderParser = map(
  seq(str("<"), identifierParser, optional(placeholderEndParser)),
  ([, name, end]): TemplatePart => {
    if (!end) {
      return { kind: "placeholder", value: `<${name}`, name, assignment: null, closed: false };
    }
    const { assignment } = end;
    return {
      kind: "placeholder",
      value: assignment === null ? `<${name}>` : `<${name}=${assignment.replaceAll(">", "\\>")}>`,
      name,
      assignment,
      closed: true,
    };
  },
);

const namedReferenceParser = map(
  parseRegex(/\\k<[A-Za-z_$][A-Za-z0-9_$]*>/, "named back-reference"),
  (value): TemplatePart => ({ kind: "escape", value }),
);

const backrefParser = map(
  parseRegex(/\\[1-9][0-9]*/, "back-reference"),
  (value): TemplatePart => ({ kind: "backref", value, index: Number(value.slice(1)) }),
);

const escapeParser = map(
  seq(str("\\"), anyChar()),
  ([slash, character]): TemplatePart => ({ kind: "escape", value: `${slash}${character}` }),
);

const classParser = map(
  parseRegex(/\[(?:\\[\s\S]|[^\]\\])*\]/, "character class"),
  (value): TemplatePart => ({ kind: "class", value }),
);

const lookaroundParser = map(
  any(str("(?<="), str("(?<!"), str("(?:"), str("(?="), str("(?!")),
  (value): TemplatePart => ({ kind: "open", value, capturing: false, name: null }),
);

const namedGroupParser = map(
  seq(str("(?<"), identifierParser, str(">")),
  ([open, name, close]): TemplatePart => ({
    kind: "open",
    value: `${open}${name}${close}`,
    capturing: true,
    name,
  }),
);

const groupParser = map(
  str("("),
  (value): TemplatePart => ({ kind: "open", value, capturing: true, name: null }),
);

const quantifierParser = map(
  parseRegex(/(?:[*+?]|\{\d+(?:,\d*)?\})\??/, "quantifier"),
  (value): TemplatePart => ({ kind: "quantifier", value }),
);

const singleCharacterParser = map(
  anyChar(),
  (value): TemplatePart => {
    if (value === ")") {
      return { kind: "close", value };
    }
    if (value === "|") {
      return { kind: "alternation", value };
    }
    if (value === "." || value === "^" || value === "$") {
      return { kind: "meta", value };
    }
    return { kind: "text", value };
  },
);

const textParser = map(
  parseRegex(/[^\\[()<|*+?{.^$]+/, "text"),
  (value): TemplatePart => ({ kind: "text", value }),
);

const templatePartsParser = map(
  seq(
    many(
      any(
        textParser,
        placeholderParser,
        namedReferenceParser,
        backrefParser,
        escapeParser,
        classParser,
        lookaroundParser,
        namedGroupParser,
        groupParser,
        quantifierParser,
        singleCharacterParser,
      ),
    ),
    eof(),
  ),
  ([parts]) => parts,
);

/** Splits a template into regex syntax parts and `<...>` placeholders. */
export function tokenizeTemplate(source: string): TemplatePart[] {
  const parsed = templatePartsParser({ text: source, index: 0 });
  if (!parsed.success) {
    const report = formatErrorReport(parsed, {
      color: false,
      contextLines: 0,
      stack: false,
    });
    throw new TemplateSyntaxError(`Invalid template:\n${report}`);
  }

  return mergeText(parsed.value);
}

function mergeText(parts: readonly TemplatePart[]): TemplatePart[] {
  const merged: TemplatePart[] = [];
  for (const part of parts) {
    const previous = merged[merged.length - 1];
    if (part.kind === "text" && previous?.kind === "text") {
      merged[merged.length - 1] = { kind: "text", value: previous.value + part.value };
      continue;
    }
    merged.push(part);
  }
  return merged;
}

/** Error for a `<name` that refers to a token, field or alias but never closes. */
export function unterminatedPlaceholder(part: PlaceholderPart, template?: string): TemplateSyntaxError {
  const where = template === undefined ? "" : ` in template: ${template}`;
  return new TemplateSyntaxError(`Unterminated placeholder "${part.value}"${where}`);
}

export function isIdentifier(value: string): boolean {
  return new RegExp(`^${IDENTIFIER.source}$`).test(value);
}
