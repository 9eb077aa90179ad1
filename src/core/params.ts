import debug from "debug";
import type {
  Command,
  Configuration,
  Param,
  ParameterInput,
  ParamType,
  ResolutionContext,
} from "../types";
import { CommandNotFoundError, ParameterError } from "./errors";
import { VariableResolver } from "./resolver";

const log = debug("taskdeck:params");

const ZERO_VALUES: Record<ParamType, string> = {
  bool: "false",
  float: "0",
  int: "0",
  string: "",
};

const INT_PATTERN = /^[-+]?\d+$/;
const TRUE_PATTERN = /^(1|t|T|true|TRUE|True)$/;
const FALSE_PATTERN = /^(0|f|F|false|FALSE|False)$/;

function normalize(param: Param, value: string): string | undefined {
  switch (param.type) {
    case "int":
      return INT_PATTERN.test(value) ? value : undefined;
    case "float":
      return value.trim() !== "" && Number.isFinite(Number(value))
        ? value
        : undefined;
    case "bool":
      if (TRUE_PATTERN.test(value)) {
        return "true";
      }
      return FALSE_PATTERN.test(value) ? "false" : undefined;
    default:
      return value;
  }
}

function pick(
  values: Readonly<Record<string, string>>,
  key: string | undefined
): string | undefined {
  return key !== undefined && Object.hasOwn(values, key)
    ? values[key]
    : undefined;
}

/**
 * Bind invocation values to a command's parameters. Values are looked up by
 * name, then shorthand, then position; defaults fill the rest. Flags without
 * a value or default take their type's zero value.
 */
export function bindParameters(
  command: string,
  params: readonly Param[],
  input: ParameterInput = {}
): Record<string, string> {
  const values = input.values ?? {};
  const args = input.args ?? [];

  const known = new Set(
    params.flatMap((param) =>
      param.shorthand ? [param.name, param.shorthand] : [param.name]
    )
  );
  for (const key of Object.keys(values)) {
    if (!known.has(key)) {
      throw new ParameterError(command, key, `Unknown parameter '${key}'`);
    }
  }

  const bound: Record<string, string> = {};
  for (const param of params) {
    const given =
      pick(values, param.name) ??
      pick(values, param.shorthand) ??
      (param.position === undefined ? undefined : args[param.position]);
    const raw = given ?? param.default;

    if (raw === undefined) {
      if (param.required) {
        throw new ParameterError(
          command,
          param.name,
          `Missing required parameter '${param.name}'`
        );
      }
      if (param.flag) {
        bound[param.name] = ZERO_VALUES[param.type];
      }
      continue;
    }

    const value = normalize(param, raw);
    if (value === undefined) {
      throw new ParameterError(
        command,
        param.name,
        `Invalid ${param.type} value '${raw}' for parameter '${param.name}'`
      );
    }
    bound[param.name] = value;
  }

  log(`Bound parameters for ${command}:`, bound);
  return bound;
}

/**
 * The resolution context for one invocation of `name`: the configuration's
 * variables with the bound parameters on top.
 */
export function commandContext(
  configuration: Configuration,
  name: string,
  input: ParameterInput = {}
): ResolutionContext {
  const command = configuration.commands[name];
  if (!command) {
    throw new CommandNotFoundError(name);
  }

  return {
    env: configuration.env,
    overlay: configuration.overlay,
    parameters: bindParameters(name, command.params ?? [], input),
    variables: configuration.variables,
  };
}

/**
 * Resolve the parameter placeholders left in a command's lines.
 */
export function resolveCommand(
  configuration: Configuration,
  name: string,
  input: ParameterInput = {}
): Command {
  const resolver = new VariableResolver(
    commandContext(configuration, name, input)
  );
  const command = configuration.commands[name];
  if (!command) {
    throw new CommandNotFoundError(name);
  }

  const resolved: Command = {
    ...command,
    dependencies: [...command.dependencies],
    run: resolver.resolve(command.run),
  };
  if (command.pre !== undefined) {
    resolved.pre = resolver.resolve(command.pre);
  }
  if (command.post !== undefined) {
    resolved.post = resolver.resolve(command.post);
  }
  if (command.tasks !== undefined) {
    resolved.tasks = resolver.resolveAll(command.tasks);
  }
  if (command.commands !== undefined) {
    resolved.commands = Object.fromEntries(
      Object.entries(command.commands).map(([task, line]) => [
        task,
        resolver.resolve(line),
      ])
    );
  }
  return resolved;
}
