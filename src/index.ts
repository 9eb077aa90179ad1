export {
  VariableResolver,
  resolveVariables,
  type ResolverOptions,
} from "./core/resolver";
export {
  ConditionEvaluator,
  evaluateCondition,
  type ConditionExplanation,
  type PredicateName,
} from "./core/condition";
export {
  ConfigLoader,
  loadConfiguration,
  assembleConfiguration,
  mergeDocuments,
  CONFIG_FILE_NAME,
  ENV_FILE_NAME,
} from "./core/loader";
export {
  buildDependencyGraph,
  validateDependencies,
  assertValidDependencies,
} from "./core/dependency-graph";
export { bindParameters, commandContext, resolveCommand } from "./core/params";
export { CommandMatcher } from "./core/command-matcher";
export { Parser, parseArgs } from "./core/parser";
export {
  LoadError,
  CommandNotFoundError,
  DependencyError,
  ParameterError,
  describeDependencyIssue,
} from "./core/errors";
export { Inspector } from "./inspection/inspector";
export { Logger } from "./utils/logger";

export type {
  CommandDocument,
  ParamDocument,
  ProjectDocument,
} from "./core/schema";
export type {
  Command,
  Configuration,
  ConfigIssue,
  DependencyIssue,
  LoadOptions,
  OutputConfig,
  Param,
  ParameterInput,
  ParamType,
  ParsedArgs,
  ResolutionContext,
  VariableMap,
} from "./types";
