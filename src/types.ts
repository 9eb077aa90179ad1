export type VariableMap = Readonly<Record<string, string>>;

export type ParamType = "string" | "int" | "float" | "bool";

/**
 * A command parameter. Flags are passed by name (or shorthand); positional
 * parameters by index.
 */
export type Param = {
  name: string;
  shorthand?: string;
  type: ParamType;
  default?: string;
  description?: string;
  required: boolean;
  flag: boolean;
  position?: number;
};

export type Command = {
  run: string;
  dependencies: string[];
  description?: string;
  condition?: string;
  pre?: string;
  post?: string;
  timeout?: string;
  parallel?: boolean;
  tasks?: string[];
  commands?: Record<string, string>;
  params?: Param[];
  workingDir?: string;
};

export type Configuration = {
  name?: string;
  variables: Record<string, string>;
  // Values from the env file; never written back to the document
  overlay: Record<string, string>;
  commands: Record<string, Command>;
  path: string;
  workingDir?: string;
  // Only set when the caller supplied an environment to load with
  env?: NodeJS.ProcessEnv;
};

/**
 * Everything a placeholder lookup may consult. A loaded `Configuration`
 * satisfies this shape directly.
 */
export interface ResolutionContext {
  variables: VariableMap;
  overlay: VariableMap;
  parameters?: VariableMap;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export type LoadOptions = {
  cwd?: string;
  file?: string;
  envFile?: string;
  global?: boolean;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
};

export type OutputConfig = {
  quiet?: boolean;
  prefix?: boolean | string;
};

export type ParsedArgs = {
  patterns: string[];
  config: OutputConfig;
  check: boolean;
  file?: string;
  global: boolean;
};

export type ParameterInput = {
  // Keyed by parameter name or shorthand
  values?: Readonly<Record<string, string>>;
  args?: readonly string[];
};

export type DependencyIssue =
  | { kind: "missing"; command: string; dependency: string }
  | { kind: "cycle"; commands: string[] };

export type ConfigIssue = {
  path: (string | number)[];
  message: string;
};
