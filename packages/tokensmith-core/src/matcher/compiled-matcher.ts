import type { CompiledProgram, RootElement } from "../compiler/types.ts";
import { TemplateSyntaxError } from "../errors.ts";
import { MatchResult } from "./match-result.ts";

export type Replacement = string | ((match: MatchResult) => string);

/** Immutable expanded pattern plus the group map needed to rebuild records from its matches. */
export class CompiledMatcher {
  private readonly anchored: RegExp;
  private readonly full: RegExp;
  private readonly scanning: RegExp;

  constructor(readonly program: CompiledProgram) {
    this.anchored = new RegExp(program.source, `${program.flags}dy`);
    this.full = new RegExp(`(?:${program.source})(?![\\s\\S])`, `${program.flags}dy`);
    this.scanning = new RegExp(program.source, `${program.flags}dg`);
  }

  get template(): string {
    return this.program.template;
  }

  get flags(): string {
    return this.program.flags;
  }

  /** Expanded pattern handed to the engine. */
  get source(): string {
    return this.program.source;
  }

  get groupCount(): number {
    return this.program.groupCount;
  }

  /** Matches at the start of `text` only. */
  match(text: string): MatchResult | null {
    return this.execAt(this.anchored, text, 0);
  }

  /** Matches the whole of `text`. */
  fullmatch(text: string): MatchResult | null {
    return this.execAt(this.full, text, 0);
  }

  /** First match at or after `fromIndex`. */
  search(text: string, fromIndex = 0): MatchResult | null {
    return this.execAt(this.scanning, text, fromIndex);
  }

  *matchAll(text: string): Generator<MatchResult, void, undefined> {
    const pattern = new RegExp(this.scanning);
    pattern.lastIndex = 0;
    for (let found = pattern.exec(text); found; found = pattern.exec(text)) {
      if (found[0].length === 0) {
        pattern.lastIndex = advance(text, pattern.lastIndex, /[uv]/.test(pattern.flags));
      }
      yield new MatchResult(found, this.program);
    }
  }

  /**
   * One entry per match: the top-level tokens' records and the template's own groups in pattern
   * order, a single value when there is only one, and the matched text when there are none.
   */
  findAll(text: string): unknown[] {
    const found: unknown[] = [];
    for (const match of this.matchAll(text)) {
      found.push(this.rootValues(match));
    }
    return found;
  }

  /** Replaces the first `count` matches (all of them when `count` is 0). */
  replace(text: string, replacement: Replacement, count = 0): string {
    let output = "";
    let last = 0;
    let replaced = 0;

    for (const match of this.matchAll(text)) {
      if (count > 0 && replaced >= count) {
        break;
      }
      output += text.slice(last, match.index);
      output += typeof replacement === "string" ? match.expand(replacement) : replacement(match);
      last = match.index + match.text.length;
      replaced += 1;
    }

    return output + text.slice(last);
  }

  /** Splits `text` around matches, with the template's own groups interleaved. */
  split(text: string, limit = 0): Array<string | undefined> {
    const pieces: Array<string | undefined> = [];
    let last = 0;
    let splits = 0;

    for (const match of this.matchAll(text)) {
      if (limit > 0 && splits >= limit) {
        break;
      }
      pieces.push(text.slice(last, match.index), ...match.groups());
      last = match.index + match.text.length;
      splits += 1;
    }

    pieces.push(text.slice(last));
    return pieces;
  }

  /** Matches at the start of `text` and rebuilds the pattern's only top-level token. */
  construct(text: string): object | null {
    const tokens = this.program.roots.filter((root) => root.kind === "token");
    const [root] = tokens;
    if (!root || tokens.length > 1 || root.kind !== "token") {
      throw new TemplateSyntaxError(
        `construct() needs a pattern with exactly one top-level token, found ${tokens.length}: ${this.template}`,
      );
    }

    const reconstruction = this.match(text)?.reconstructSite(root.node);
    return reconstruction?.status === "matched" ? reconstruction.value : null;
  }

  private execAt(pattern: RegExp, text: string, index: number): MatchResult | null {
    pattern.lastIndex = index;
    const found = pattern.exec(text);
    return found ? new MatchResult(found, this.program) : null;
  }

  private rootValues(match: MatchResult): unknown {
    const { roots } = this.program;
    if (roots.length === 0) {
      return match.text;
    }
    const values = roots.map((root) => this.rootValue(match, root));
    return values.length === 1 ? values[0] : values;
  }

  private rootValue(match: MatchResult, root: RootElement): unknown {
    if (root.kind === "group") {
      return match.group(root.group.index);
    }
    const reconstruction = match.reconstructSite(root.node);
    return reconstruction.status === "matched" ? reconstruction.value : null;
  }
}

// Moves past an empty match, by a whole code point when the pattern reads code points.
function advance(text: string, index: number, unicode: boolean): number {
  if (!unicode) {
    return index + 1;
  }
  const codePoint = text.codePointAt(index);
  return index + (codePoint !== undefined && codePoint > 0xffff ? 2 : 1);
}
