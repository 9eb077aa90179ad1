import { describe, expect, it } from "vitest";
import {
  assertValidDependencies,
  buildDependencyGraph,
  validateDependencies,
} from "../../core/dependency-graph";
import { DependencyError } from "../../core/errors";
import type { Command } from "../../types";

const command = (...dependencies: string[]): Command => ({
  dependencies,
  run: "true",
});

describe("dependency graph", () => {
  describe("buildDependencyGraph", () => {
    it("adds an edge from each command to its dependencies", () => {
      const graph = buildDependencyGraph({
        commands: {
          build: command("lint", "test"),
          lint: command(),
          test: command(),
        },
      });

      expect(graph.nodes().sort()).toEqual(["build", "lint", "test"]);
      expect((graph.successors("build") || []).sort()).toEqual(["lint", "test"]);
      expect(graph.successors("lint")).toEqual([]);
    });

    it("adds unknown dependencies as nodes", () => {
      const graph = buildDependencyGraph({
        commands: { deploy: command("ghost") },
      });

      expect(graph.hasNode("ghost")).toBe(true);
    });
  });

  describe("validateDependencies", () => {
    it("accepts an acyclic configuration", () => {
      expect(
        validateDependencies({
          commands: {
            build: command("clean"),
            clean: command(),
            release: command("build", "test"),
            test: command("build"),
          },
        })
      ).toEqual([]);
    });

    it("reports dependencies on unknown commands", () => {
      expect(
        validateDependencies({
          commands: { deploy: command("build", "ghost"), build: command() },
        })
      ).toEqual([{ command: "deploy", dependency: "ghost", kind: "missing" }]);
    });

    it("reports a self dependency as a cycle", () => {
      expect(
        validateDependencies({ commands: { loop: command("loop") } })
      ).toEqual([{ commands: ["loop"], kind: "cycle" }]);
    });

    it("reports each group of mutually dependent commands", () => {
      const issues = validateDependencies({
        commands: {
          a: command("b"),
          b: command("c"),
          c: command("a"),
          x: command("y"),
          y: command("x"),
          free: command("a"),
        },
      });

      expect(issues).toHaveLength(2);
      expect(issues).toContainEqual({ commands: ["a", "b", "c"], kind: "cycle" });
      expect(issues).toContainEqual({ commands: ["x", "y"], kind: "cycle" });
    });
  });

  describe("assertValidDependencies", () => {
    it("does nothing for a valid configuration", () => {
      expect(() =>
        assertValidDependencies({ commands: { a: command() } })
      ).not.toThrow();
    });

    it("throws a DependencyError describing every issue", () => {
      expect(() =>
        assertValidDependencies({
          commands: { a: command("a"), b: command("nope") },
        })
      ).toThrow(
        new DependencyError([
          { command: "b", dependency: "nope", kind: "missing" },
          { commands: ["a"], kind: "cycle" },
        ])
      );
    });

    it("formats the message", () => {
      expect(
        new DependencyError([
          { command: "b", dependency: "nope", kind: "missing" },
          { commands: ["a", "b"], kind: "cycle" },
        ]).message
      ).toBe(
        "b depends on unknown command nope; Circular dependency: a -> b -> a"
      );
    });
  });
});
