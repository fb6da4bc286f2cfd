export { Builder, getDefaultBuilder, resetDefaultBuilder } from "./builder.ts";
export type { BuilderOptions } from "./builder.ts";
export { DEFAULT_CACHE_SIZE, PatternCache } from "./cache.ts";
export { formatMs, nowNs, nsToMs } from "./common/trace.ts";
export { resolveTextInput, parseTextInvocation } from "./common/input.ts";
export type { ParsedTextInvocation, ResolveTextInputOptions, ResolvedTextInput } from "./common/input.ts";
export { compileFieldProgram, compileProgram } from "./compiler/compile.ts";
export type { CompiledProgram, RootElement, TokenNode, UserGroup } from "./compiler/types.ts";
export {
  CompileCycleError,
  DuplicateTokenError,
  InvalidSubtypeLinkError,
  MissingFieldPatternError,
  ReconstructionError,
  RegistrationError,
  RenderError,
  TemplateSyntaxError,
  TokensmithError,
  UnknownOccurrenceError,
  UnknownTokenError,
} from "./errors.ts";
export { CONVERTERS, formatPrimitive, isPrimitiveKind, parsePrimitive } from "./fields/converters.ts";
export type { PrimitiveKind, PrimitiveValueMap, TimeOfDay } from "./fields/converters.ts";
export { describeFieldType, field } from "./fields/field.ts";
export type {
  FieldMap,
  FieldSpec,
  FieldType,
  InferFields,
  ListOptions,
  RepeatOptions,
  TokenType,
} from "./fields/field.ts";
export { CompiledMatcher } from "./matcher/compiled-matcher.ts";
export type { Replacement } from "./matcher/compiled-matcher.ts";
export { MatchResult } from "./matcher/match-result.ts";
export type { GroupRef, Reconstruction, Span, TokenRef } from "./matcher/match-result.ts";
export { DEFAULT_LIST_SEPARATOR, TokenRegistry } from "./registry/registry.ts";
export type { FieldDefinition, TokenDefinition, TokenInput } from "./registry/types.ts";
export { renderRecord } from "./render/render.ts";
export { tokenizeTemplate } from "./template/syntax.ts";
export type { TemplatePart } from "./template/syntax.ts";
