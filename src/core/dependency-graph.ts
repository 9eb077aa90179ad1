import debug from "debug";
import graphlib from "graphlib";
import type { Configuration, DependencyIssue } from "../types";
import { DependencyError } from "./errors";

const { Graph, alg } = graphlib;

const log = debug("taskdeck:graph");

/**
 * Build a graph with an edge from each command to each of its
 * dependencies. Unknown dependency names become bare nodes.
 */
export function buildDependencyGraph(
  configuration: Pick<Configuration, "commands">
) {
  const graph = new Graph();

  for (const name of Object.keys(configuration.commands)) {
    graph.setNode(name);
  }
  for (const [name, command] of Object.entries(configuration.commands)) {
    for (const dependency of command.dependencies) {
      log(`Adding edge from ${name} to ${dependency}`);
      graph.setEdge(name, dependency);
    }
  }

  log("Nodes:", graph.nodes());
  log("Edges:", graph.edges());
  return graph;
}

/**
 * Report dependencies on commands that do not exist and groups of commands
 * that depend on each other. Loading never calls this; it is for callers
 * that need an acyclic order.
 */
export function validateDependencies(
  configuration: Pick<Configuration, "commands">
): DependencyIssue[] {
  const issues: DependencyIssue[] = [];

  for (const [name, command] of Object.entries(configuration.commands)) {
    for (const dependency of command.dependencies) {
      if (!Object.hasOwn(configuration.commands, dependency)) {
        issues.push({ command: name, dependency, kind: "missing" });
      }
    }
  }

  const graph = buildDependencyGraph(configuration);
  if (!alg.isAcyclic(graph)) {
    // findCycles includes single nodes with a self-edge
    for (const cycle of alg.findCycles(graph)) {
      issues.push({ commands: [...cycle].sort(), kind: "cycle" });
    }
  }

  return issues;
}

export function assertValidDependencies(
  configuration: Pick<Configuration, "commands">
): void {
  const issues = validateDependencies(configuration);
  if (issues.length > 0) {
    throw new DependencyError(issues);
  }
}
