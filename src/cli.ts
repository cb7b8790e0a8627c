#!/usr/bin/env node
// aictx CLI
// Usage: aictx <command> [options]

import { parseArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  buildManifestCommand,
  diffCommand,
  exportCommand,
  listCommand,
  resolveContext,
  validateCommand,
} from "./commands.js";
import { logLevelFromEnv } from "./config.js";
import { ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";
import { createContextServer } from "./server.js";

function printUsage(): void {
  process.stderr.write(
    `Usage: aictx <command> [options]

Commands:
  validate              Check frontmatter, schemas, required files and references
  build-manifest        Write manifests.yaml and save state for diff
  list                  List indexed documents
  diff                  Compare the workspace against the last built manifest
  export <adapter>      Copy the adapter's declared documents (e.g. cursor)
  serve                 Serve documents as MCP resources over stdio

Options:
  --root <dir>          Context root (default: auto-detect from cwd)
  --status <status>     list: only documents with this status
  --kind <kind>         list: only documents of this kind
  --json                list, diff: machine-readable output
  --active-only         serve: only documents counted by the root checksum
  --verbose             Debug diagnostics on stderr
  --help, -h            Show this help
`
  );
}

const CLI_OPTIONS = {
  root: { type: "string" },
  status: { type: "string" },
  kind: { type: "string" },
  json: { type: "boolean", default: false },
  "active-only": { type: "boolean", default: false },
  verbose: { type: "boolean", default: false },
  help: { type: "boolean", default: false, short: "h" },
} as const;

function parseCli(argv: string[]) {
  return parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true, strict: true });
}

async function main(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (err) {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    printUsage();
    return 2;
  }
  const { values, positionals } = parsed;
  const [command, ...args] = positionals;

  if (values.help || command === undefined) {
    printUsage();
    return values.help ? 0 : 2;
  }

  const logger = createLogger({ level: values.verbose ? "debug" : logLevelFromEnv() });
  const ctx = await resolveContext({ cwd: process.cwd(), root: values.root, logger });

  switch (command) {
    case "validate":
      return validateCommand(ctx);
    case "build-manifest":
      return buildManifestCommand(ctx);
    case "list":
      return listCommand(ctx, { status: values.status, kind: values.kind, json: values.json });
    case "diff":
      return diffCommand(ctx, { json: values.json });
    case "export": {
      const adapter = args[0];
      if (adapter === undefined) {
        process.stderr.write("Error: export needs an adapter name\n");
        return 2;
      }
      return exportCommand(ctx, adapter);
    }
    case "serve": {
      const { server } = createContextServer(ctx.root, {
        activeOnly: values["active-only"],
        project: ctx.config.project,
        conventionVersion: ctx.config.convention_version,
        logger,
      });
      await server.connect(new StdioServerTransport());
      return 0;
    }
    default:
      process.stderr.write(`Error: unknown command '${command}'\n`);
      printUsage();
      return 2;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ConfigError) {
      process.stderr.write(`${err.format()}\n`);
    } else {
      process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
    }
    process.exitCode = 1;
  }
);
