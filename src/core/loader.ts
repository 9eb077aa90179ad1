import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import debug from "debug";
import { parse as parseDotenv } from "dotenv";
import { parseDocument, visit } from "yaml";
import type {
  Command,
  Configuration,
  LoadOptions,
  Param,
  ParamType,
  ResolutionContext,
} from "../types";
import { LoadError } from "./errors";
import { VariableResolver } from "./resolver";
import {
  type CommandDocument,
  type ParamDocument,
  type ProjectDocument,
  ProjectDocumentSchema,
} from "./schema";

const log = debug("taskdeck:loader");

export const CONFIG_FILE_NAME = "taskdeck.yml";
export const ENV_FILE_NAME = ".env";
const GLOBAL_CONFIG_FILE_NAME = ".taskdeck.yml";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Parse YAML with merge keys, keeping every number and boolean as the text
 * it was written with (`1.20` stays `1.20`).
 */
function parseSource(content: string): unknown {
  const document = parseDocument(content, { merge: true });
  const [error] = document.errors;
  if (error) {
    throw error;
  }

  visit(document, {
    Scalar(_key, node) {
      if (
        typeof node.value === "number" ||
        typeof node.value === "boolean" ||
        typeof node.value === "bigint"
      ) {
        node.value = node.source ?? String(node.value);
      }
    },
  });

  const value: unknown = document.toJS();
  return value;
}

/**
 * Project document wins over the global one key by key; the two variable
 * and command maps are merged, not replaced.
 */
export function mergeDocuments(
  base: ProjectDocument,
  project: ProjectDocument
): ProjectDocument {
  return {
    commands: { ...base.commands, ...project.commands },
    name: project.name || base.name,
    variables: { ...base.variables, ...project.variables },
    workingdir: project.workingdir || base.workingdir,
  };
}

const PARAM_TYPES: readonly ParamType[] = ["string", "int", "float", "bool"];

function isParamType(value: string): value is ParamType {
  return PARAM_TYPES.some((type) => type === value);
}

function buildParam(source: ParamDocument): Param {
  const [name = source.name, shorthand] = source.name.split("|", 2);
  const type = source.type?.toLowerCase() ?? "string";
  const param: Param = {
    flag: source.flag ?? (source.position === undefined),
    name,
    required: source.required ?? false,
    // Unknown types are read as strings
    type: isParamType(type) ? type : "string",
  };

  if (shorthand) {
    param.shorthand = shorthand;
  }
  if (source.default !== undefined) {
    param.default = source.default;
  }
  if (source.description !== undefined) {
    param.description = source.description;
  }
  if (!param.flag && source.position !== undefined) {
    param.position = source.position;
  }
  return param;
}

function buildCommand(
  entry: CommandDocument | null,
  context: ResolutionContext
): Command {
  const source: CommandDocument = entry ?? {};
  const params = source.params?.map(buildParam);
  // Parameter placeholders wait for the values given at invocation
  const resolver = new VariableResolver(context, {
    deferred: new Set(params?.map((param) => param.name)),
  });

  const command: Command = {
    dependencies: [...(source.dependencies ?? source.depends ?? [])],
    run: resolver.resolve(source.run ?? ""),
  };

  if (source.description !== undefined) {
    command.description = source.description;
  }
  // Guards stay unresolved; they are evaluated right before each run
  if (source.condition !== undefined) {
    command.condition = source.condition;
  }
  if (source.pre !== undefined) {
    command.pre = resolver.resolve(source.pre);
  }
  if (source.post !== undefined) {
    command.post = resolver.resolve(source.post);
  }
  if (source.timeout !== undefined) {
    command.timeout = source.timeout;
  }
  if (source.parallel !== undefined) {
    command.parallel = source.parallel;
  }
  if (source.tasks !== undefined) {
    command.tasks = resolver.resolveAll(source.tasks);
  }
  if (source.commands !== undefined) {
    command.commands = Object.fromEntries(
      Object.entries(source.commands).map(([name, line]) => [
        name,
        resolver.resolve(line),
      ])
    );
  }
  if (params !== undefined) {
    command.params = params;
  }
  if (source.workingdir !== undefined) {
    command.workingDir = source.workingdir;
  }

  return command;
}

/**
 * Turn a parsed document and its overlay into a frozen configuration,
 * substituting variables in every command line exactly once.
 */
export function assembleConfiguration(
  document: ProjectDocument,
  overlay: Record<string, string>,
  source: { path: string; env?: NodeJS.ProcessEnv }
): Configuration {
  const variables = { ...document.variables };
  const env = source.env ? { ...source.env } : undefined;
  const context: ResolutionContext = { env, overlay, variables };

  const commands: Record<string, Command> = {};
  for (const [name, entry] of Object.entries(document.commands ?? {})) {
    commands[name] = buildCommand(entry, context);
    log(`Resolved ${name}: ${commands[name]?.run}`);
  }

  const configuration: Configuration = {
    commands,
    overlay: { ...overlay },
    path: source.path,
    variables,
  };
  if (document.name) {
    configuration.name = document.name;
  }
  if (document.workingdir) {
    configuration.workingDir = document.workingdir;
  }
  if (env) {
    configuration.env = env;
  }

  return deepFreeze(configuration);
}

export class ConfigLoader {
  private readonly options: LoadOptions;

  constructor(options: LoadOptions = {}) {
    this.options = options;
  }

  load(): Configuration {
    const cwd = this.options.cwd ?? process.cwd();
    const path = resolve(cwd, this.options.file ?? CONFIG_FILE_NAME);
    const envPath = resolve(
      cwd,
      this.options.envFile ?? join(dirname(path), ENV_FILE_NAME)
    );

    log(`Loading ${path}`);
    let document = this.readDocument(path);
    const overlay = this.readOverlay(envPath);

    if (this.options.global !== false) {
      const globalPath = this.findGlobalDocument(path);
      if (globalPath) {
        log(`Merging global config ${globalPath}`);
        document = mergeDocuments(this.readDocument(globalPath), document);
      }
    }

    return assembleConfiguration(document, overlay, {
      env: this.options.env,
      path,
    });
  }

  private readDocument(path: string): ProjectDocument {
    if (!existsSync(path)) {
      throw new LoadError(`Config file not found: ${path}`, path);
    }

    let content: string;
    try {
      content = readFileSync(path, "utf-8");
    } catch (error) {
      throw new LoadError(
        `Failed to read config file ${path}: ${errorMessage(error)}`,
        path,
        { cause: error }
      );
    }

    let raw: unknown;
    try {
      raw = parseSource(content);
    } catch (error) {
      throw new LoadError(
        `Failed to parse config file ${path}: ${errorMessage(error)}`,
        path,
        { cause: error }
      );
    }

    // An empty document is an empty project
    const parsed = ProjectDocumentSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new LoadError(`Invalid config file ${path}`, path, {
        cause: parsed.error,
        issues: parsed.error.issues.map((issue) => ({
          message: issue.message,
          path: issue.path,
        })),
      });
    }

    return parsed.data;
  }

  private readOverlay(path: string): Record<string, string> {
    if (!existsSync(path)) {
      log(`No env file at ${path}`);
      return {};
    }

    try {
      return parseDotenv(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new LoadError(
        `Failed to read env file ${path}: ${errorMessage(error)}`,
        path,
        { cause: error }
      );
    }
  }

  private findGlobalDocument(projectPath: string): string | undefined {
    const env = this.options.env ?? process.env;
    const candidates: string[] = [];

    // biome-ignore lint/complexity/useLiteralKeys: ts
    const xdgConfigHome = env["XDG_CONFIG_HOME"];
    if (xdgConfigHome) {
      candidates.push(join(xdgConfigHome, "taskdeck", "config.yml"));
    }
    candidates.push(
      join(this.options.homeDir ?? homedir(), GLOBAL_CONFIG_FILE_NAME)
    );

    return candidates.find(
      (candidate) => resolve(candidate) !== projectPath && existsSync(candidate)
    );
  }
}

export function loadConfiguration(options: LoadOptions = {}): Configuration {
  return new ConfigLoader(options).load();
}
