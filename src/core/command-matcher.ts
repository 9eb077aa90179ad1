import micromatch from "micromatch";
import { CommandNotFoundError } from "./errors";

export class CommandMatcher {
  /**
   * Resolves patterns to command names.
   * Inclusions and `!` exclusions apply in left-to-right order; no patterns
   * selects every command.
   */
  select(patterns: string[], names: string[]): string[] {
    if (patterns.length === 0) {
      return [...names];
    }

    let result: string[] = [];
    for (const pattern of patterns) {
      result = pattern.startsWith("!")
        ? this.exclude(pattern.slice(1), result)
        : [...result, ...this.findMatches(pattern, names)];
    }

    // Remove duplicates while preserving order
    return [...new Set(result)];
  }

  private exclude(pattern: string, result: string[]): string[] {
    if (this.isGlobPattern(pattern)) {
      const toRemove = micromatch(result, pattern);
      return result.filter((name) => !toRemove.includes(name));
    }
    return result.filter((name) => name !== pattern);
  }

  private findMatches(pattern: string, names: string[]): string[] {
    if (names.includes(pattern)) {
      return [pattern];
    }

    const matches = micromatch(names, pattern);
    if (matches.length === 0 && !this.isGlobPattern(pattern)) {
      throw new CommandNotFoundError(pattern);
    }
    return matches;
  }

  private isGlobPattern(pattern: string): boolean {
    return (
      pattern.includes("*") ||
      pattern.includes("?") ||
      pattern.includes("[") ||
      pattern.includes("{")
    );
  }
}
