import debug from "debug";
import type { ResolutionContext, VariableMap } from "../types";

const log = debug("taskdeck:resolver");

// $NAME or ${NAME}; the braces are part of the match but not of the name
const PLACEHOLDER_PATTERN = /\$(\w+|\{\w+\})/g;

function has(map: VariableMap | undefined, name: string): map is VariableMap {
  return map !== undefined && Object.hasOwn(map, name);
}

export type ResolverOptions = {
  // Names left as placeholders whatever the context holds
  deferred?: ReadonlySet<string>;
};

export class VariableResolver {
  private readonly context: ResolutionContext;
  private readonly deferred: ReadonlySet<string>;

  constructor(context: ResolutionContext, options: ResolverOptions = {}) {
    this.context = context;
    this.deferred = options.deferred ?? new Set();
  }

  /**
   * Look a variable up through parameters, declared variables, the env file
   * overlay and the process environment, in that order.
   */
  lookup(name: string): string | undefined {
    if (this.deferred.has(name)) {
      return undefined;
    }

    const { parameters, variables, overlay } = this.context;

    if (has(parameters, name)) {
      return parameters[name];
    }
    if (has(variables, name)) {
      return variables[name];
    }
    if (has(overlay, name)) {
      return overlay[name];
    }

    // Read at lookup time so later changes to process.env stay visible
    const env = this.context.env ?? process.env;
    return Object.hasOwn(env, name) ? env[name] : undefined;
  }

  /**
   * Replace every known placeholder in `input`. Unknown placeholders are
   * kept as written so a shell can still expand them.
   */
  resolve(input: string): string {
    if (input === "") {
      return input;
    }

    // String.replace never rescans inserted text, so values are literal
    return input.replace(PLACEHOLDER_PATTERN, (match: string, body: string) => {
      const name = body.startsWith("{") ? body.slice(1, -1) : body;
      const value = this.lookup(name);

      if (value === undefined) {
        log(`Unresolved placeholder ${match}, leaving as-is`);
        return match;
      }
      return value;
    });
  }

  resolveAll(inputs: string[]): string[] {
    return inputs.map((input) => this.resolve(input));
  }
}

export function resolveVariables(
  context: ResolutionContext,
  input: string
): string {
  return new VariableResolver(context).resolve(input);
}
