import debug from "debug";
import { CommandMatcher } from "../core/command-matcher";
import { ConditionEvaluator } from "../core/condition";
import { validateDependencies } from "../core/dependency-graph";
import { describeDependencyIssue, LoadError } from "../core/errors";
import { loadConfiguration } from "../core/loader";
import { parseArgs } from "../core/parser";
import type { Command, Configuration, LoadOptions, Param } from "../types";
import { Logger } from "../utils/logger";

const log = debug("taskdeck:inspector");

// e.g. `--env|e (string) = dev` or `<target>#0 (string) required`
function describeParam(param: Param): string {
  const name = param.flag
    ? `--${param.name}${param.shorthand ? `|${param.shorthand}` : ""}`
    : `<${param.name}>${param.position === undefined ? "" : `#${param.position}`}`;
  const parts = [name, `(${param.type})`];
  if (param.default !== undefined) {
    parts.push(`= ${param.default}`);
  }
  if (param.required) {
    parts.push("required");
  }
  return parts.join(" ");
}

export class Inspector {
  private readonly matcher = new CommandMatcher();

  /**
   * Load the configuration, print the selected commands as they would run
   * right now and optionally check the dependency lists. Returns the exit
   * code.
   */
  inspect(args: string[], options: LoadOptions = {}): number {
    const parsed = parseArgs(args);
    const logger = new Logger(parsed.config);

    try {
      const configuration = loadConfiguration({
        ...options,
        file: parsed.file ?? options.file,
        global: parsed.global && options.global !== false,
      });
      const names = this.matcher.select(
        parsed.patterns,
        Object.keys(configuration.commands)
      );
      log("Selected commands:", names);

      logger.summary(
        `${configuration.name ?? "(unnamed)"}: ${names.length} command(s) from ${configuration.path}`
      );
      for (const name of names) {
        logger.registerCommand(name);
      }

      const evaluator = new ConditionEvaluator(configuration);
      for (const name of names) {
        const command = configuration.commands[name];
        if (command) {
          this.printCommand(logger, evaluator, name, command);
        }
      }

      return parsed.check ? this.check(logger, configuration) : 0;
    } catch (error) {
      if (error instanceof LoadError) {
        logger.failure(error.format());
      } else {
        logger.failure(error instanceof Error ? error.message : String(error));
      }
      return 1;
    }
  }

  private printCommand(
    logger: Logger,
    evaluator: ConditionEvaluator,
    name: string,
    command: Command
  ): void {
    if (command.description) {
      logger.field(name, "description", command.description);
    }
    if (command.run) {
      logger.field(name, "run", command.run);
    }
    if (command.pre) {
      logger.field(name, "pre", command.pre);
    }
    if (command.post) {
      logger.field(name, "post", command.post);
    }
    for (const task of command.tasks ?? []) {
      logger.field(name, command.parallel ? "task (parallel)" : "task", task);
    }
    for (const [task, line] of Object.entries(command.commands ?? {})) {
      logger.field(name, task, line);
    }
    for (const param of command.params ?? []) {
      logger.field(name, "param", describeParam(param));
    }
    if (command.workingDir) {
      logger.field(name, "workingdir", command.workingDir);
    }
    if (command.dependencies.length > 0) {
      logger.field(name, "dependencies", command.dependencies.join(", "));
    }
    if (command.timeout) {
      logger.field(name, "timeout", command.timeout);
    }
    if (command.condition) {
      const { predicate, resolved, result } = evaluator.explain(
        command.condition
      );
      const verdict = result ? "runs" : "skipped";
      logger.field(name, "condition", `${resolved} (${verdict})`);
      if (predicate === undefined) {
        logger.warning(`${name}: unrecognized condition "${resolved}"`);
      }
    }
  }

  private check(logger: Logger, configuration: Configuration): number {
    const issues = validateDependencies(configuration);
    if (issues.length === 0) {
      logger.passed("Dependencies are valid");
      return 0;
    }
    for (const issue of issues) {
      logger.failure(describeDependencyIssue(issue));
    }
    return 1;
  }
}
