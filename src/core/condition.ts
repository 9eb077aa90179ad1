import { existsSync } from "node:fs";
import { resolve as resolvePath } from "node:path";
import debug from "debug";
import type { ResolutionContext } from "../types";
import { VariableResolver } from "./resolver";

const log = debug("taskdeck:condition");

export type PredicateName = "equals" | "notEquals" | "contains" | "exists";

type Predicate = {
  name: PredicateName;
  pattern: RegExp;
  test: (operands: string[], context: ResolutionContext) => boolean;
};

export type ConditionExplanation = {
  resolved: string;
  predicate?: PredicateName;
  result: boolean;
};

// Tried in order; the operators never overlap, so at most one can match.
// Do not add an operator whose text is contained in another's.
const PREDICATES: readonly Predicate[] = [
  {
    name: "equals",
    pattern: /^\s*(.+?)\s*==\s*(.+?)\s*$/,
    test: ([left, right]) => left === right,
  },
  {
    name: "notEquals",
    pattern: /^\s*(.+?)\s*!=\s*(.+?)\s*$/,
    test: ([left, right]) => left !== right,
  },
  {
    name: "contains",
    pattern: /^\s*(.+?)\s+contains\s+(.+?)\s*$/,
    test: ([haystack, needle]) =>
      haystack !== undefined &&
      needle !== undefined &&
      haystack.includes(needle),
  },
  {
    name: "exists",
    pattern: /^\s*exists\s+(.+?)\s*$/,
    test: ([target], context) =>
      target !== undefined &&
      existsSync(resolvePath(context.cwd ?? process.cwd(), target)),
  },
];

export class ConditionEvaluator {
  private readonly context: ResolutionContext;
  private readonly resolver: VariableResolver;

  constructor(context: ResolutionContext) {
    this.context = context;
    this.resolver = new VariableResolver(context);
  }

  evaluate(condition: string): boolean {
    return this.explain(condition).result;
  }

  /**
   * Evaluate a guard and report which predicate decided it. A guard that
   * matches no predicate is false.
   */
  explain(condition: string): ConditionExplanation {
    if (condition.trim() === "") {
      return { resolved: "", result: true };
    }

    const resolved = this.resolver.resolve(condition);

    for (const predicate of PREDICATES) {
      const match = resolved.match(predicate.pattern);
      if (!match) {
        continue;
      }

      const operands = match.slice(1).map((operand) => operand.trim());
      const result = predicate.test(operands, this.context);
      log(`${predicate.name}(${operands.join(", ")}) -> ${result}`);
      return { predicate: predicate.name, resolved, result };
    }

    log(`Unrecognized condition "${resolved}", treating as false`);
    return { resolved, result: false };
  }
}

export function evaluateCondition(
  context: ResolutionContext,
  condition: string
): boolean {
  return new ConditionEvaluator(context).evaluate(condition);
}
