// aictx public library surface
// Index, validate and snapshot a context convention root from your own tooling.

export { parseDocument, parseFrontmatter, validateSchema, normalizeVersion } from "./parser.js";
export {
  buildIndex,
  collectRules,
  collectTaskDirs,
  requiredFilesForComplexity,
} from "./indexer.js";
export {
  validate,
  validateSchemas,
  validateRequiredFiles,
  validateReferences,
  refExists,
} from "./validator.js";
export {
  normalizeContent,
  contentChecksum,
  fileChecksum,
  aggregateChecksum,
  eligibleKeys,
} from "./checksum.js";
export {
  buildManifest,
  collectRelations,
  manifestToYaml,
  parseManifest,
  readManifest,
  writeManifest,
  saveState,
  loadLastManifest,
  GENERATOR,
} from "./manifest.js";
export { diffManifest } from "./diff.js";
export { listDocuments, formatTable } from "./list.js";
export {
  loadAdapterDeclaration,
  buildPayload,
  runExport,
  BUILTIN_ADAPTERS,
} from "./exporter.js";
export { loadConfig, findAictxDir, findContextRoot } from "./config.js";
export { emitHook, onHook, HOOK_NAMES } from "./hooks.js";
export { loadPlugins, observersFromModule } from "./plugins.js";
export { createLogger } from "./logger.js";
export { createContextServer } from "./server.js";
export {
  FormatError,
  SchemaError,
  IntegrityError,
  ExportSourceError,
  AdapterDeclarationError,
  ManifestFormatError,
  ConfigError,
} from "./errors.js";
export type {
  ContextDocument,
  DocumentIndex,
  IndexResult,
  ValidationResult,
  Manifest,
  ManifestEntry,
  Relation,
  DiffReport,
  ExportEntry,
  ExportPayload,
  DocumentStatus,
  Complexity,
} from "./model.js";
export type { ChecksumMode } from "./checksum.js";
export type { AictxConfig } from "./config.js";
export type { HookEvent, HookName, Observer } from "./hooks.js";
export type { AdapterDeclaration } from "./exporter.js";
export type { Logger, LogLevel } from "./logger.js";
export type { ContextServerOptions, ContextMcpServer } from "./server.js";
export type { ListRow, ListFilters } from "./list.js";
