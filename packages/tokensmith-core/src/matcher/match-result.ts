import type { CompiledProgram, OccurrenceSite, TokenNode, UserGroup } from "../compiler/types.ts";
import { ReconstructionError, UnknownOccurrenceError } from "../errors.ts";
import type { TokenType } from "../fields/field.ts";
import { matchedRecord, reconstructNode, viewOfMatch, type MatchView } from "../reconstruct/reconstruct.ts";
import { isSameOrSubtype } from "../registry/registry.ts";

export type GroupRef = number | string;

export type Span = readonly [start: number, end: number];

export type Reconstruction<R> =
  | { status: "matched"; token: string; value: R }
  | { status: "absent" };

/** Reference to a registered token: its typed handle, or its name. */
export type TokenRef<R> = TokenType<R, unknown> | string;

/**
 * One successful match. Group accessors use the numbering of the groups written in the template;
 * groups allocated for tokens and fields are reachable only through `get`/`reconstruct`.
 */
export class MatchResult {
  private readonly view: MatchView;

  constructor(
    private readonly match: RegExpExecArray,
    private readonly program: CompiledProgram,
  ) {
    this.view = viewOfMatch(match);
  }

  /** Offset of the match in `input`. */
  get index(): number {
    return this.match.index;
  }

  get input(): string {
    return this.match.input;
  }

  /** Whole matched text. */
  get text(): string {
    return this.match[0];
  }

  group(ref: GroupRef = 0): string | undefined {
    return this.view.text(this.resolveGroup(ref));
  }

  groups(): Array<string | undefined> {
    return this.program.userGroups.map((group) => this.view.text(group.group));
  }

  namedGroups(): Record<string, string | undefined> {
    const named: Record<string, string | undefined> = {};
    for (const group of this.program.userGroups) {
      if (group.name !== null) {
        named[group.name] = this.view.text(group.group);
      }
    }
    return named;
  }

  /** Start offset of the group in `input`, `-1` when it did not take part. */
  start(ref: GroupRef = 0): number {
    return this.span(ref)?.[0] ?? -1;
  }

  end(ref: GroupRef = 0): number {
    return this.span(ref)?.[1] ?? -1;
  }

  span(ref: GroupRef = 0): Span | null {
    return this.view.span(this.resolveGroup(ref)) ?? null;
  }

  /** Substitutes `$n`, `$<name>`, `$&` and `$$` in `template` with this match's groups. */
  expand(template: string): string {
    const pattern = /\$(?:(\$)|(&)|<([^>]*)>|(\d+))/g;
    return template.replace(
      pattern,
      (
        _whole: string,
        dollar: string | undefined,
        all: string | undefined,
        name: string | undefined,
        digits: string | undefined,
      ) => {
        if (dollar !== undefined) {
          return "$";
        }
        if (all !== undefined) {
          return this.text;
        }
        const ref: GroupRef = name ?? Number(digits);
        return this.group(ref) ?? "";
      },
    );
  }

  /** Reconstructed record of the `index`-th occurrence of `type`, `null` when it did not take part. */
  get<R>(type: TokenType<R, unknown>, index?: number): R | null;
  get(type: string, index?: number): object | null;
  get<R>(type: TokenRef<R>, index = 1): R | object | null {
    const reconstruction = this.resolveOccurrence(type, index);
    return reconstruction.status === "matched" ? reconstruction.value : null;
  }

  reconstruct<R>(type: TokenType<R, unknown>, index?: number): Reconstruction<R>;
  reconstruct(type: string, index?: number): Reconstruction<object>;
  reconstruct<R>(type: TokenRef<R>, index = 1): Reconstruction<R> | Reconstruction<object> {
    return this.resolveOccurrence(type, index);
  }

  /** Span of the `index`-th occurrence of `type`, `null` when it did not take part. */
  spanOf<R>(type: TokenRef<R>, index = 1): Span | null {
    const site = this.site(type, index);
    return site ? this.spanOfSite(site.node) : null;
  }

  /** Reconstruction of one token site of the compiled program, such as a top-level root. */
  reconstructSite(node: TokenNode): Reconstruction<object> {
    const reconstructed = reconstructNode(this.view, node);
    return reconstructed
      ? { status: "matched", token: reconstructed.token.name, value: reconstructed.value }
      : { status: "absent" };
  }

  spanOfSite(node: TokenNode): Span | null {
    const record = matchedRecord(this.view, node);
    return record ? (this.view.span(record.group) ?? null) : null;
  }

  private resolveOccurrence<R>(type: TokenRef<R>, index: number): Reconstruction<R> | Reconstruction<object> {
    const site = this.site(type, index);
    const reconstructed = site ? reconstructNode(this.view, site.node, site.token) : null;
    if (!reconstructed) {
      return { status: "absent" };
    }

    const { token, value } = reconstructed;
    if (typeof type === "string") {
      return { status: "matched", token: token.name, value };
    }
    if (!type.accepts(value)) {
      throw new ReconstructionError(
        `Token ${token.name} was reconstructed into a value that ${type.name} does not accept.`,
      );
    }
    return { status: "matched", token: token.name, value };
  }

  // Sites written as `type` or one of its subtypes always count. A site written as a supertype
  // counts only when the alternative that matched is `type` or below it.
  private site<R>(type: TokenRef<R>, index: number): OccurrenceSite | null {
    const name = typeof type === "string" ? type : type.name;
    const sites = this.program.occurrences.get(name) ?? [];
    const indexed = sites[0]?.token;
    if (
      !Number.isInteger(index) ||
      index < 1 ||
      index > sites.length ||
      !indexed ||
      (typeof type !== "string" && indexed.handle !== type)
    ) {
      throw new UnknownOccurrenceError(name, index, sites.length);
    }

    let seen = 0;
    for (const site of sites) {
      if (isSameOrSubtype(site.node.token, site.token) || this.matchedWithin(site)) {
        seen += 1;
        if (seen === index) {
          return site;
        }
      }
    }
    return null;
  }

  private matchedWithin(site: OccurrenceSite): boolean {
    const record = matchedRecord(this.view, site.node);
    return record !== null && isSameOrSubtype(record.token, site.token);
  }

  private resolveGroup(ref: GroupRef): number {
    if (ref === 0) {
      return 0;
    }
    const group: UserGroup | undefined =
      typeof ref === "number"
        ? this.program.userGroups[ref - 1]
        : this.program.userGroups.find((candidate) => candidate.name === ref);
    if (!group) {
      throw new RangeError(`No such group: ${String(ref)}`);
    }
    return group.group;
  }
}
