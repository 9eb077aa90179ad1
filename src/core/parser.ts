import type { ParsedArgs } from "../types";

const FILE_FLAG = "file=";
const PREFIX_FLAG = "prefix=";

export class Parser {
  parse(args: string[]): ParsedArgs {
    const result: ParsedArgs = {
      check: false,
      config: {},
      global: true,
      patterns: [],
    };

    for (const arg of args) {
      this.processArg(arg, result);
    }

    return result;
  }

  private processArg(arg: string, result: ParsedArgs): void {
    if (arg.startsWith("[") && arg.endsWith("]")) {
      result.patterns.push(...this.parsePatternGroup(arg));
    } else if (arg.startsWith("--")) {
      this.processLongFlag(arg.substring(2), result);
    } else if (arg.startsWith("-")) {
      this.processShortFlags(arg.substring(1), result);
    } else {
      console.warn(`Ignoring argument without brackets: ${arg}`);
    }
  }

  private processLongFlag(flag: string, result: ParsedArgs): void {
    if (flag === "quiet") {
      result.config.quiet = true;
    } else if (flag === "check") {
      result.check = true;
    } else if (flag === "no-global") {
      result.global = false;
    } else if (flag === "no-prefix") {
      result.config.prefix = false;
    } else if (flag.startsWith(PREFIX_FLAG)) {
      result.config.prefix = flag.substring(PREFIX_FLAG.length);
    } else if (flag.startsWith(FILE_FLAG)) {
      result.file = flag.substring(FILE_FLAG.length);
    } else {
      console.warn(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(flags: string, result: ParsedArgs): void {
    for (const flag of flags) {
      if (flag === "q") {
        result.config.quiet = true;
      } else {
        console.warn(`Unknown flag: -${flag}`);
      }
    }
  }

  private parsePatternGroup(input: string): string[] {
    const content = input.slice(1, -1);

    // Split on commas outside of {a,b} brace groups
    const patterns: string[] = [];
    let current = "";
    let depth = 0;

    for (const char of content) {
      if (char === "{") {
        depth++;
      } else if (char === "}") {
        depth--;
      }

      if (char === "," && depth === 0) {
        if (current.trim()) {
          patterns.push(current.trim());
        }
        current = "";
      } else {
        current += char;
      }
    }

    if (current.trim()) {
      patterns.push(current.trim());
    }

    return patterns;
  }
}

export function parseArgs(args: string[]): ParsedArgs {
  return new Parser().parse(args);
}
