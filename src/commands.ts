// Command entry points. Each takes an explicit context (root, config,
// observers, logger, output sink) and returns a process exit code.

import { join } from "node:path";
import {
  AICTX_DIR,
  findAictxDir,
  findContextRoot,
  loadConfig,
  type AictxConfig,
} from "./config.js";
import { diffManifest, isEmptyDiff } from "./diff.js";
import {
  AdapterDeclarationError,
  ExportSourceError,
  ManifestFormatError,
} from "./errors.js";
import { runExport } from "./exporter.js";
import { emitHook, type Observer } from "./hooks.js";
import { buildIndex } from "./indexer.js";
import { formatTable, listDocuments, type ListFilters } from "./list.js";
import type { Logger } from "./logger.js";
import type { Manifest } from "./model.js";
import {
  buildManifest,
  loadLastManifest,
  saveState,
  writeManifest,
} from "./manifest.js";
import { loadPlugins, resolvePluginDescriptors } from "./plugins.js";
import { validate } from "./validator.js";

export interface CommandOutput {
  out(line: string): void;
  err(line: string): void;
}

export const processOutput: CommandOutput = {
  out: (line) => {
    process.stdout.write(line + "\n");
  },
  err: (line) => {
    process.stderr.write(line + "\n");
  },
};

export interface CommandContext {
  root: string;
  aictxDir: string;
  config: AictxConfig;
  observers: readonly Observer[];
  logger: Logger;
  output: CommandOutput;
  now?: () => Date;
}

export interface ResolveContextOptions {
  cwd: string;
  root?: string;
  logger: Logger;
  output?: CommandOutput;
}

/** Locate root and tool directory, load config, resolve plugin observers. */
export async function resolveContext(
  options: ResolveContextOptions
): Promise<CommandContext> {
  const { cwd, logger, output = processOutput } = options;
  const aictxDir = findAictxDir(cwd) ?? join(cwd, AICTX_DIR);
  const root = findContextRoot(cwd, options.root);
  const config = loadConfig(aictxDir);
  const observers = await loadPlugins(
    resolvePluginDescriptors(aictxDir, config),
    logger
  );
  logger.debug(`root=${root} tool dir=${aictxDir}`);
  return { root, aictxDir, config, observers, logger, output };
}

function reportErrors(ctx: CommandContext, errors: readonly string[]): number {
  for (const error of errors) ctx.output.err(error);
  return 1;
}

export async function validateCommand(ctx: CommandContext): Promise<number> {
  const { root, config, observers, logger } = ctx;
  await emitHook(observers, { hook: "before_validate", root, config }, logger);
  const { ok, errors, index } = validate(root);
  await emitHook(
    observers,
    { hook: "after_validate", root, config, index, ok },
    logger
  );
  if (errors.length > 0) return reportErrors(ctx, errors);
  ctx.output.out(`Validated ${index.size} document(s).`);
  return 0;
}

export async function buildManifestCommand(ctx: CommandContext): Promise<number> {
  const { root, aictxDir, config, observers, logger } = ctx;
  const { errors, index } = validate(root);
  if (errors.length > 0) return reportErrors(ctx, errors);

  await emitHook(
    observers,
    { hook: "before_build_manifest", root, config, index },
    logger
  );
  const manifest = buildManifest(root, index, {
    conventionVersion: config.convention_version,
    now: ctx.now?.(),
  });
  const written = writeManifest(root, manifest);
  const state = saveState(aictxDir, manifest);
  logger.debug(`wrote ${written} and ${state}`);
  await emitHook(
    observers,
    { hook: "after_build_manifest", root, config, manifest },
    logger
  );

  ctx.output.out(
    `Built manifest: ${manifest.documents.length} documents, active_set=${manifest.active_set.length}.`
  );
  return 0;
}

export interface ListOptions extends ListFilters {
  json?: boolean;
}

export function listCommand(ctx: CommandContext, options: ListOptions = {}): number {
  const { index, errors } = buildIndex(ctx.root);
  if (errors.length > 0) return reportErrors(ctx, errors);

  const rows = listDocuments(ctx.root, index, options);
  if (options.json) {
    ctx.output.out(JSON.stringify(rows, null, 2));
    return 0;
  }
  for (const line of formatTable(rows)) ctx.output.out(line);
  return 0;
}

export function diffCommand(ctx: CommandContext, options: { json?: boolean } = {}): number {
  const { index, errors } = buildIndex(ctx.root);
  if (errors.length > 0) return reportErrors(ctx, errors);

  let last: Manifest | null;
  try {
    last = loadLastManifest(ctx.aictxDir);
  } catch (err) {
    if (err instanceof ManifestFormatError) return reportErrors(ctx, [err.message]);
    throw err;
  }
  if (!last) {
    ctx.output.out("No previous manifest in state. Run build-manifest first.");
    return 0;
  }

  const report = diffManifest(index, last);
  if (options.json) {
    ctx.output.out(JSON.stringify(report, null, 2));
    return 0;
  }
  if (report.added.length > 0) ctx.output.out(`Added: ${report.added.join(", ")}`);
  if (report.removed.length > 0) ctx.output.out(`Removed: ${report.removed.join(", ")}`);
  if (report.changed.length > 0) ctx.output.out(`Changed: ${report.changed.join(", ")}`);
  if (isEmptyDiff(report)) ctx.output.out("No changes.");
  return 0;
}

export async function exportCommand(
  ctx: CommandContext,
  adapter: string
): Promise<number> {
  const { root, config, observers, logger } = ctx;
  if (!config.adapters.includes(adapter)) {
    return reportErrors(ctx, [`Adapter '${adapter}' not in config.adapters.`]);
  }
  const { errors, index } = validate(root);
  if (errors.length > 0) return reportErrors(ctx, errors);

  await emitHook(observers, { hook: "before_export", root, config, index, adapter }, logger);
  try {
    const result = runExport(root, index, adapter);
    logger.debug(`wrote ${result.contextFile}`);
  } catch (err) {
    if (err instanceof AdapterDeclarationError || err instanceof ExportSourceError) {
      return reportErrors(ctx, [err.message]);
    }
    throw err;
  }
  await emitHook(observers, { hook: "after_export", root, config, adapter }, logger);

  ctx.output.out(`Exported to ${adapter}.`);
  return 0;
}
