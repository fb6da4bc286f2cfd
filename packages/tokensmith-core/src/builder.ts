import { PatternCache, DEFAULT_CACHE_SIZE } from "./cache.ts";
import { formatMs, nowNs, nsToMs } from "./common/trace.ts";
import { compileProgram } from "./compiler/compile.ts";
import { ReconstructionError, UnknownTokenError } from "./errors.ts";
import type { FieldMap, InferFields, TokenType } from "./fields/field.ts";
import { CompiledMatcher, type Replacement } from "./matcher/compiled-matcher.ts";
import type { MatchResult } from "./matcher/match-result.ts";
import { TokenRegistry } from "./registry/registry.ts";
import type { TokenDefinition, TokenInput } from "./registry/types.ts";
import { renderRecord } from "./render/render.ts";

/** Runtime options of a {@link Builder}. */
export type BuilderOptions = {
  /** Trace level (`1` compiles, `2` also registrations and expanded patterns). */
  verbose?: number;
  /** Logger sink used by verbose tracing. */
  logger?: (line: string) => void;
  /** Compiled patterns kept per builder (defaults to `256`; `0` disables caching). */
  cacheSize?: number;
};

/**
 * Owns a token registry and the patterns compiled against it. Builders share nothing, so the
 * same record shape can be registered with different templates in different builders.
 */
export class Builder {
  readonly registry = new TokenRegistry();
  private readonly cache: PatternCache;
  private readonly verbose: number;
  private readonly log: (line: string) => void;

  constructor(options: BuilderOptions = {}) {
    this.cache = new PatternCache(options.cacheSize ?? DEFAULT_CACHE_SIZE);
    this.verbose = options.verbose ?? 0;
    this.log = options.logger ?? (() => {});
  }

  register<
    F extends FieldMap,
    V extends object = Record<never, never>,
    R extends object = V & InferFields<F>,
  >(input: TokenInput<F, V, R>): TokenType<R, V & InferFields<F>> {
    const handle = this.registry.register(input);
    if (this.verbose >= 2) {
      const definition = this.registry.lookup(handle.name);
      this.log(
        `[tokensmith] register ${definition.name} fields=${[...definition.fields.keys()].join(",")} extends=${definition.supertype?.name ?? "-"}`,
      );
    }
    return handle;
  }

  /** Builder-wide `<name>` fragment; a token's own aliases take precedence inside its template. */
  alias(name: string, pattern: string): void {
    this.registry.setAlias(name, pattern);
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  lookup(name: string): TokenDefinition {
    return this.registry.lookup(name);
  }

  compile(template: string, flags = ""): CompiledMatcher {
    const started = this.verbose > 0 ? nowNs() : 0n;
    const { matcher, hit } = this.cache.getOrCompile(template, flags, this.registry.revision, () =>
      new CompiledMatcher(compileProgram(this.registry, template, flags)),
    );

    if (this.verbose > 0) {
      const sites = new Set(
        [...matcher.program.occurrences.values()].flatMap((list) => list.map((site) => site.node)),
      );
      this.log(
        `[tokensmith] compile ${formatMs(nsToMs(nowNs() - started))} groups=${matcher.groupCount} sites=${sites.size} cache=${hit ? "hit" : "miss"}`,
      );
    }
    if (this.verbose >= 2 && !hit) {
      this.log(`[tokensmith] source ${matcher.source}`);
    }
    return matcher;
  }

  match(template: string, text: string, flags = ""): MatchResult | null {
    return this.compile(template, flags).match(text);
  }

  search(template: string, text: string, flags = ""): MatchResult | null {
    return this.compile(template, flags).search(text);
  }

  fullmatch(template: string, text: string, flags = ""): MatchResult | null {
    return this.compile(template, flags).fullmatch(text);
  }

  matchAll(template: string, text: string, flags = ""): MatchResult[] {
    return [...this.compile(template, flags).matchAll(text)];
  }

  findAll(template: string, text: string, flags = ""): unknown[] {
    return this.compile(template, flags).findAll(text);
  }

  replace(template: string, text: string, replacement: Replacement, count = 0, flags = ""): string {
    return this.compile(template, flags).replace(text, replacement, count);
  }

  split(template: string, text: string, limit = 0, flags = ""): Array<string | undefined> {
    return this.compile(template, flags).split(text, limit);
  }

  /** Matches `<NAME>` at the start of `text` and rebuilds that record. */
  construct<R>(type: TokenType<R, unknown>, text: string): R | null;
  construct(type: string, text: string): object | null;
  construct<R>(type: TokenType<R, unknown> | string, text: string): R | object | null {
    const definition = this.resolve(type);
    const value = this.compile(`<${definition.name}>`).construct(text);
    if (value === null || typeof type === "string") {
      return value;
    }
    if (!type.accepts(value)) {
      throw new ReconstructionError(`Token ${type.name} was reconstructed into a value it does not accept.`);
    }
    return value;
  }

  /** Writes a record back out through its token's template. */
  render<R>(type: TokenType<R, unknown> | string, value: R): string {
    return renderRecord(this.registry, this.resolve(type), value);
  }

  private resolve<R>(type: TokenType<R, unknown> | string): TokenDefinition {
    const name = typeof type === "string" ? type : type.name;
    const definition = this.registry.lookup(name);
    if (typeof type !== "string" && definition.handle !== type) {
      throw new UnknownTokenError(name);
    }
    return definition;
  }
}

let defaultBuilder: Builder | null = null;

/** Process-wide builder, created on first use. */
export function getDefaultBuilder(): Builder {
  defaultBuilder ??= new Builder();
  return defaultBuilder;
}

/** Drops the process-wide builder; the next {@link getDefaultBuilder} call starts empty. */
export function resetDefaultBuilder(): void {
  defaultBuilder = null;
}
