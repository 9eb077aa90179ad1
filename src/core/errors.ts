import type { ConfigIssue, DependencyIssue } from "../types";

export class LoadError extends Error {
  readonly path: string;
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    path: string,
    options: { cause?: unknown; issues?: ConfigIssue[] } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "LoadError";
    this.path = path;
    this.issues = options.issues ?? [];
  }

  /**
   * Message plus one line per shape issue.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${location}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export class CommandNotFoundError extends Error {
  readonly command: string;

  constructor(command: string) {
    super(`Command not found: ${command}`);
    this.name = "CommandNotFoundError";
    this.command = command;
  }
}

export class ParameterError extends Error {
  readonly command: string;
  readonly parameter: string;

  constructor(command: string, parameter: string, message: string) {
    super(`${command}: ${message}`);
    this.name = "ParameterError";
    this.command = command;
    this.parameter = parameter;
  }
}

export function describeDependencyIssue(issue: DependencyIssue): string {
  if (issue.kind === "missing") {
    return `${issue.command} depends on unknown command ${issue.dependency}`;
  }
  const [first] = issue.commands;
  return `Circular dependency: ${[...issue.commands, first].join(" -> ")}`;
}

export class DependencyError extends Error {
  readonly issues: DependencyIssue[];

  constructor(issues: DependencyIssue[]) {
    super(issues.map(describeDependencyIssue).join("; "));
    this.name = "DependencyError";
    this.issues = issues;
  }
}
