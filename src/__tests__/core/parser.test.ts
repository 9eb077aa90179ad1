import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseArgs } from "../../core/parser";

describe("Parser", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("parseArgs", () => {
    it("returns defaults for empty input", () => {
      expect(parseArgs([])).toEqual({
        check: false,
        config: {},
        global: true,
        patterns: [],
      });
    });

    it("parses a pattern group", () => {
      expect(parseArgs(["[test:*]"]).patterns).toEqual(["test:*"]);
    });

    it("parses multiple patterns with exclusions", () => {
      expect(parseArgs(["[test:*, !test:e2e]"]).patterns).toEqual([
        "test:*",
        "!test:e2e",
      ]);
    });

    it("keeps commas inside brace groups", () => {
      expect(parseArgs(["[build:{app,lib},lint]"]).patterns).toEqual([
        "build:{app,lib}",
        "lint",
      ]);
    });

    it("collects patterns from several groups", () => {
      expect(parseArgs(["[a]", "[b,c]"]).patterns).toEqual(["a", "b", "c"]);
    });

    it("parses output flags", () => {
      expect(parseArgs(["--quiet", "--no-prefix"]).config).toEqual({
        prefix: false,
        quiet: true,
      });
      expect(parseArgs(["-q"]).config).toEqual({ quiet: true });
    });

    it("parses custom prefix", () => {
      expect(parseArgs(["--prefix=►"]).config.prefix).toBe("►");
    });

    it("parses check, file and global flags", () => {
      const result = parseArgs([
        "--check",
        "--file=ci/taskdeck.yml",
        "--no-global",
      ]);

      expect(result.check).toBe(true);
      expect(result.file).toBe("ci/taskdeck.yml");
      expect(result.global).toBe(false);
    });

    it("warns about unknown flags", () => {
      const result = parseArgs(["--verbose", "-x"]);

      expect(result.config).toEqual({});
      expect(console.warn).toHaveBeenCalledWith("Unknown flag: --verbose");
      expect(console.warn).toHaveBeenCalledWith("Unknown flag: -x");
    });

    it("ignores bare words and unclosed brackets", () => {
      const result = parseArgs(["test:*", "[test:*"]);

      expect(result.patterns).toEqual([]);
      expect(console.warn).toHaveBeenCalledTimes(2);
    });
  });
});
