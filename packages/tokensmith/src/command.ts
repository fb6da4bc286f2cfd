import { buildCommand } from "@stricli/core";
import chalk, { Chalk, type ChalkInstance } from "chalk";
import { text as readStream } from "node:stream/consumers";
import {
  parseTextInvocation,
  resolveTextInput,
  type CompiledMatcher,
  type MatchResult,
  type Span,
} from "@tokensmith/core";
import { buildFromDefinitions, parseDefinitions } from "./definitions.ts";

export type MatchMode = "match" | "search" | "fullmatch" | "all";

const MATCH_MODES: readonly MatchMode[] = ["match", "search", "fullmatch", "all"];

export type MatchCommandFlags = {
  cwd?: string;
  flags?: string;
  mode?: MatchMode;
  lines?: boolean;
  json?: boolean;
  "no-color"?: boolean;
  verbose?: number;
};

/** One top-level token of a match, rebuilt into its record. */
export type MatchedToken = {
  token: string;
  occurrence: number;
  status: "matched" | "absent";
  /** Concrete token the record was rebuilt for (a subtype when the pattern was polymorphic). */
  matchedAs: string | null;
  value: unknown;
  span: Span | null;
};

export type MatchRow = {
  /** One-based line number when matching line by line, else `null`. */
  line: number | null;
  start: number;
  end: number;
  text: string;
  groups: Array<string | null>;
  tokens: MatchedToken[];
};

export type MatchCommandResult = {
  template: string;
  source: string;
  mode: MatchMode;
  matches: MatchRow[];
};

export async function runMatchCommand(
  definitionsInput: string,
  patternInput: string,
  textInput: string | undefined,
  flags: MatchCommandFlags,
): Promise<MatchCommandResult> {
  const cwd = flags.cwd;
  const definitions = await parseTextInvocation(definitionsInput, { cwd }, parseDefinitions);
  const builder = buildFromDefinitions(definitions.spec, {
    verbose: flags.verbose,
    logger: flags.verbose ? (line) => process.stderr.write(`${line}\n`) : undefined,
  });

  const pattern = await resolveTextInput(patternInput, { cwd });
  const template = pattern.path === null ? pattern.text : pattern.text.replace(/\r?\n$/, "");
  const matcher = builder.compile(template, flags.flags ?? "");
  const text =
    textInput === undefined ? await readStream(process.stdin) : (await resolveTextInput(textInput, { cwd })).text;
  const mode = flags.mode ?? "search";

  const matches: MatchRow[] = [];
  if (flags.lines ?? false) {
    const lines = text.split(/\r?\n/);
    if (lines[lines.length - 1] === "") {
      lines.pop();
    }
    lines.forEach((line, index) => {
      for (const match of runMode(matcher, mode, line)) {
        matches.push(toMatchRow(matcher, match, index + 1));
      }
    });
  } else {
    for (const match of runMode(matcher, mode, text)) {
      matches.push(toMatchRow(matcher, match, null));
    }
  }

  return { template, source: matcher.source, mode, matches };
}

function runMode(matcher: CompiledMatcher, mode: MatchMode, text: string): MatchResult[] {
  if (mode === "all") {
    return [...matcher.matchAll(text)];
  }
  const match =
    mode === "match" ? matcher.match(text) : mode === "fullmatch" ? matcher.fullmatch(text) : matcher.search(text);
  return match ? [match] : [];
}

function toMatchRow(matcher: CompiledMatcher, match: MatchResult, line: number | null): MatchRow {
  const tokens: MatchedToken[] = [];
  for (const root of matcher.program.roots) {
    if (root.kind !== "token") {
      continue;
    }
    const token = root.node.token.name;
    const reconstruction = match.reconstructSite(root.node);
    tokens.push({
      token,
      occurrence: root.occurrence,
      status: reconstruction.status,
      matchedAs: reconstruction.status === "matched" ? reconstruction.token : null,
      value: reconstruction.status === "matched" ? reconstruction.value : null,
      span: match.spanOfSite(root.node),
    });
  }

  return {
    line,
    start: match.start(),
    end: match.end(),
    text: match.text,
    groups: match.groups().map((group) => group ?? null),
    tokens,
  };
}

type FormatMatchOutputOptions = {
  color?: boolean;
  chalkInstance?: ChalkInstance;
};

export function formatMatchOutput(
  result: MatchCommandResult,
  options: FormatMatchOutputOptions = {},
): string {
  if (result.matches.length === 0) {
    return "";
  }

  const chalkInstance = buildChalk(options);
  const lines: string[] = [];

  for (const row of result.matches) {
    const location = row.line === null ? `${row.start}-${row.end}` : `${row.line}:${row.start}-${row.end}`;
    lines.push(`${chalkInstance.gray(`${location}: `)}${row.text}`);
    row.groups.forEach((group, index) => {
      lines.push(`  ${chalkInstance.yellow(`$${index + 1}`)} ${group ?? chalkInstance.gray("(absent)")}`);
    });
    for (const token of row.tokens) {
      const label = `${token.token}#${token.occurrence}`;
      if (token.status === "absent") {
        lines.push(`  ${chalkInstance.cyan(label)} ${chalkInstance.gray("(absent)")}`);
        continue;
      }
      const subtype = token.matchedAs !== null && token.matchedAs !== token.token ? ` as ${token.matchedAs}` : "";
      lines.push(`  ${chalkInstance.cyan(label)}${subtype} ${JSON.stringify(token.value)}`);
    }
  }

  return lines.join("\n");
}

function buildChalk(options: FormatMatchOutputOptions): ChalkInstance {
  if (options.chalkInstance) {
    return options.chalkInstance;
  }

  const shouldColor = options.color ?? false;
  if (!shouldColor) {
    return new Chalk({ level: 0 });
  }

  const level = chalk.level > 0 ? chalk.level : 1;
  return new Chalk({ level });
}

export const matchCommand = buildCommand({
  async func(
    this: { process: { stdout: { write(s: string): void } } },
    flags: MatchCommandFlags,
    definitionsInput: string,
    patternInput: string,
    textInput?: string,
  ) {
    const result = await runMatchCommand(definitionsInput, patternInput, textInput, flags);
    if (flags.json ?? false) {
      this.process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
      return;
    }

    const output = formatMatchOutput(result, {
      color: Boolean(process.stdout.isTTY) && !(flags["no-color"] ?? false),
    });
    if (output.length > 0) {
      this.process.stdout.write(`${output}\n`);
    }
  },
  parameters: {
    flags: {
      flags: {
        kind: "parsed" as const,
        optional: true,
        brief: "Pattern flags, any of i, m, s, u, v",
        placeholder: "flags",
        parse: (input: string) => input,
      },
      mode: {
        kind: "enum" as const,
        optional: true,
        values: MATCH_MODES,
        brief: "match (at start), search (first anywhere), fullmatch, or all (default: search)",
      },
      lines: {
        kind: "boolean" as const,
        optional: true,
        brief: "Match every input line on its own",
      },
      verbose: {
        kind: "parsed" as const,
        optional: true,
        brief: "Print compile tracing to stderr (1=timings, 2=includes expanded pattern)",
        placeholder: "level",
        parse: (input: string) => {
          const value = Number(input);
          if (!Number.isFinite(value) || value < 0) {
            throw new Error("--verbose must be a non-negative number");
          }
          return Math.floor(value);
        },
      },
      json: {
        kind: "boolean" as const,
        optional: true,
        brief: "Output structured JSON instead of compact text",
      },
      "no-color": {
        kind: "boolean" as const,
        optional: true,
        brief: "Disable colored output",
      },
      cwd: {
        kind: "parsed" as const,
        optional: true,
        brief: "Working directory for resolving definition, pattern and input files",
        placeholder: "path",
        parse: (input: string) => input,
      },
    },
    positional: {
      kind: "tuple" as const,
      parameters: [
        {
          brief: "Token definitions JSON, or path to a JSON file",
          placeholder: "definitions",
          parse: (input: string) => input,
        },
        {
          brief: "Pattern template, or path to a template file",
          placeholder: "pattern",
          parse: (input: string) => input,
        },
        {
          brief: "Input text or path to an input file (defaults to stdin)",
          placeholder: "input",
          parse: (input: string) => input,
          optional: true,
        },
      ],
    },
  },
  docs: {
    brief: "Match text against a token pattern and print the rebuilt records",
  },
});
