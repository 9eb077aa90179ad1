import ansis from "ansis";
import type { OutputConfig } from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.red,
  ansis.gray,
  ansis.white,
] as const;

type Status = "summary" | "passed" | "failure" | "warning";

const MARKS: Record<Status, string> = {
  failure: ansis.red("✗"),
  passed: ansis.green("✓"),
  summary: ansis.blue("ℹ"),
  warning: ansis.yellow("⚠"),
};

export class Logger {
  private readonly colorMap = new Map<string, (typeof colors)[number]>();
  private maxPrefixLength = 0;
  private readonly config: OutputConfig;

  constructor(config: OutputConfig = {}) {
    this.config = {
      prefix: true,
      quiet: false,
      ...config,
    };
  }

  registerCommand(name: string): void {
    if (this.colorMap.has(name)) {
      return;
    }
    const color = colors[this.colorMap.size % colors.length] ?? ansis.white;
    this.colorMap.set(name, color);
    this.maxPrefixLength = Math.max(this.maxPrefixLength, name.length);
  }

  log(name: string, message: string): void {
    if (this.config.quiet) {
      return;
    }
    const prefix = this.prefixFor(name);
    for (const line of message.split("\n")) {
      if (line.trim()) {
        console.log(prefix ? `${prefix} ${line}` : line);
      }
    }
  }

  /**
   * Print a labelled field under a command, e.g. `[build] | run: make`.
   */
  field(name: string, label: string, value: string): void {
    this.log(name, `${ansis.dim(`${label}:`)} ${value}`);
  }

  summary(message: string): void {
    this.status("summary", message);
  }

  passed(message: string): void {
    this.status("passed", message);
  }

  // Failures and warnings ignore quiet mode
  failure(message: string): void {
    this.status("failure", message);
  }

  warning(message: string): void {
    this.status("warning", message);
  }

  private status(status: Status, message: string): void {
    const line = `${MARKS[status]} ${message}`;
    if (status === "failure") {
      console.error(line);
    } else if (status === "warning") {
      console.warn(line);
    } else if (!this.config.quiet) {
      console.log(line);
    }
  }

  private prefixFor(name: string): string {
    const { prefix } = this.config;
    if (prefix === false) {
      return "";
    }

    const color = this.colorMap.get(name) ?? ansis.white;
    if (typeof prefix === "string") {
      return color(prefix);
    }
    const label = `[${name}]`.padEnd(this.maxPrefixLength + 2);
    return `${color(label)} ${ansis.gray("|")}`;
  }
}
