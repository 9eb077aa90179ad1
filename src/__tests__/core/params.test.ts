import { describe, expect, it } from "vitest";
import { evaluateCondition } from "../../core/condition";
import { CommandNotFoundError, ParameterError } from "../../core/errors";
import { assembleConfiguration } from "../../core/loader";
import {
  bindParameters,
  commandContext,
  resolveCommand,
} from "../../core/params";
import { resolveVariables } from "../../core/resolver";
import type { Param } from "../../types";

const configuration = assembleConfiguration(
  {
    commands: {
      deploy: {
        commands: { check: "curl $target" },
        condition: "$env == prod",
        params: [
          { default: "dev", name: "env|e" },
          { name: "target", position: 0, required: true },
          { name: "retries", type: "int" },
          { name: "verbose", type: "bool" },
        ],
        pre: "echo $env",
        run: "deploy --env $env --to ${target} $OUT",
        tasks: ["notify $target"],
      },
      plain: { run: "echo plain" },
    },
    variables: { env: "shadowed", OUT: "./out" },
  },
  {},
  { env: {}, path: "/work/taskdeck.yml" }
);

const deployParams = configuration.commands.deploy?.params ?? [];

describe("bindParameters", () => {
  it("fills defaults and zero values", () => {
    expect(bindParameters("deploy", deployParams, { args: ["eu"] })).toEqual({
      env: "dev",
      retries: "0",
      target: "eu",
      verbose: "false",
    });
  });

  it("takes values by name, shorthand and position", () => {
    expect(
      bindParameters("deploy", deployParams, {
        args: ["us"],
        values: { e: "prod", retries: "3", verbose: "1" },
      })
    ).toEqual({ env: "prod", retries: "3", target: "us", verbose: "true" });
  });

  it("prefers the full name over the shorthand", () => {
    const bound = bindParameters("deploy", deployParams, {
      args: ["eu"],
      values: { e: "short", env: "long" },
    });

    expect(bound.env).toBe("long");
  });

  it("fails when a required parameter has no value", () => {
    expect(() => bindParameters("deploy", deployParams)).toThrow(
      new ParameterError("deploy", "target", "Missing required parameter 'target'")
    );
  });

  it("fails on a value that does not fit the type", () => {
    expect(() =>
      bindParameters("deploy", deployParams, {
        args: ["eu"],
        values: { retries: "many" },
      })
    ).toThrow("deploy: Invalid int value 'many' for parameter 'retries'");
  });

  it("fails on unknown parameters", () => {
    expect(() =>
      bindParameters("deploy", deployParams, {
        args: ["eu"],
        values: { force: "1" },
      })
    ).toThrow("deploy: Unknown parameter 'force'");
  });

  it("checks float values", () => {
    const params: Param[] = [
      { flag: true, name: "ratio", required: false, type: "float" },
    ];

    expect(bindParameters("scale", params, { values: { ratio: "0.5" } })).toEqual(
      { ratio: "0.5" }
    );
    expect(() =>
      bindParameters("scale", params, { values: { ratio: "half" } })
    ).toThrow(ParameterError);
  });

  it("leaves an optional positional parameter unbound", () => {
    const params: Param[] = [
      { flag: false, name: "path", position: 1, required: false, type: "string" },
    ];

    expect(bindParameters("open", params, { args: ["first"] })).toEqual({});
  });
});

describe("commandContext", () => {
  it("puts bound parameters above declared variables", () => {
    const context = commandContext(configuration, "deploy", { args: ["eu"] });

    expect(context.parameters).toEqual({
      env: "dev",
      retries: "0",
      target: "eu",
      verbose: "false",
    });
    expect(resolveVariables(context, "$env $OUT")).toBe("dev ./out");
  });

  it("evaluates conditions against parameter values", () => {
    const condition = configuration.commands.deploy?.condition ?? "";

    const prod = commandContext(configuration, "deploy", {
      args: ["eu"],
      values: { env: "prod" },
    });
    const dev = commandContext(configuration, "deploy", { args: ["eu"] });

    expect(evaluateCondition(prod, condition)).toBe(true);
    expect(evaluateCondition(dev, condition)).toBe(false);
  });

  it("gives commands without parameters an empty parameter tier", () => {
    expect(commandContext(configuration, "plain").parameters).toEqual({});
  });

  it("fails for an unknown command", () => {
    expect(() => commandContext(configuration, "ship")).toThrow(
      CommandNotFoundError
    );
  });
});

describe("resolveCommand", () => {
  it("substitutes parameters into every command line", () => {
    const deploy = resolveCommand(configuration, "deploy", {
      args: ["eu"],
      values: { e: "prod" },
    });

    expect(deploy.run).toBe("deploy --env prod --to eu ./out");
    expect(deploy.pre).toBe("echo prod");
    expect(deploy.tasks).toEqual(["notify eu"]);
    expect(deploy.commands).toEqual({ check: "curl eu" });
    expect(deploy.condition).toBe("$env == prod");
  });

  it("leaves the loaded configuration untouched", () => {
    resolveCommand(configuration, "deploy", { args: ["eu"] });

    expect(configuration.commands.deploy?.run).toBe(
      "deploy --env $env --to ${target} ./out"
    );
  });
});
