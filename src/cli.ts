#!/usr/bin/env node

import ansis from "ansis";
import { Inspector } from "./inspection/inspector";

function showHelp(): void {
  console.log(`
${ansis.bold("taskdeck")} - Inspect a taskdeck.yml project with variables resolved

${ansis.bold("Usage:")}
  taskdeck [patterns] [flags]

${ansis.bold("Patterns:")}
  [build:*]              Show all commands matching build:*
  [test:*,!test:slow]    Show test commands except test:slow

${ansis.bold("Flags:")}
  -q, --quiet            Only print errors and warnings
  --check                Report unknown and circular dependencies
  --file=<path>          Read another config file
  --no-global            Skip the global config file
  --no-prefix            Disable output prefixes
  --prefix=<str>         Custom prefix
  -h, --help             Show this help
  `);
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.includes("--help") || args.includes("-h")) {
    showHelp();
    process.exit(0);
  }

  const inspector = new Inspector();
  process.exit(inspector.inspect(args));
}

main();
