export { app } from "./app.ts";
export { formatMatchOutput, matchCommand, runMatchCommand } from "./command.ts";
export type {
  MatchCommandFlags,
  MatchCommandResult,
  MatchedToken,
  MatchMode,
  MatchRow,
} from "./command.ts";
export { buildFromDefinitions, definitionsSchema, parseDefinitions } from "./definitions.ts";
export type { Definitions, DefinitionsInput } from "./definitions.ts";
