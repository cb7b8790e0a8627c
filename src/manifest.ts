// Manifest builder: per-document checksums, active root checksum, relations,
// plus YAML persistence of the manifest and of the last-build state.

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join, relative, sep } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { aggregateChecksum, compareKeys, contentChecksum } from "./checksum.js";
import { ManifestFormatError } from "./errors.js";
import type {
  DocumentIndex,
  Manifest,
  ManifestEntry,
  Relation,
} from "./model.js";

export const GENERATOR = "aictx 1.0";
export const DEFAULT_CONVENTION_VERSION = "0.0.1";
export const MANIFEST_FILE = "manifests.yaml";
export const STATE_DIR = "state";
export const STATE_FILE = "last_manifest.yaml";

export interface BuildManifestOptions {
  conventionVersion?: string;
  now?: Date;
}

/** UTC timestamp without fractional seconds: 2026-01-31T09:30:00Z */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function toManifestPath(root: string, filePath: string): string {
  return relative(root, filePath).split(sep).join("/");
}

/** One `uses` edge per reference, target left unresolved. */
export function collectRelations(index: DocumentIndex): Relation[] {
  const relations: Relation[] = [];
  for (const [key, doc] of index) {
    for (const ref of doc.references) {
      relations.push({ from: key, to: ref, type: "uses" });
    }
  }
  return relations;
}

export function buildManifest(
  root: string,
  index: DocumentIndex,
  options: BuildManifestOptions = {}
): Manifest {
  const { conventionVersion = DEFAULT_CONVENTION_VERSION, now = new Date() } =
    options;

  const documents: ManifestEntry[] = [];
  const activeSet: string[] = [];
  const keys = [...index.keys()].sort(compareKeys);

  for (const key of keys) {
    const doc = index.get(key);
    if (!doc) continue;
    documents.push({
      id: key,
      kind: doc.kind,
      path: toManifestPath(root, doc.path),
      version: doc.version,
      status: doc.status,
      complexity: doc.complexity,
      checksum: contentChecksum(doc.content),
      tags: [...doc.tags],
    });
    if (doc.status === "active") activeSet.push(key);
  }

  return {
    convention_version: conventionVersion,
    generated_at: formatTimestamp(now),
    generator: GENERATOR,
    root_checksum: aggregateChecksum(index, "active"),
    documents,
    active_set: activeSet,
    relations: collectRelations(index),
  };
}

// --- Serialization ---

export function manifestToYaml(manifest: Manifest): string {
  return yaml.dump(manifest, { noRefs: true, lineWidth: -1, sortKeys: false });
}

const TimestampSchema = z.preprocess(
  (value) => (value instanceof Date ? formatTimestamp(value) : value),
  z.string()
);

const ManifestEntrySchema = z.object({
  id: z.string(),
  kind: z.string(),
  path: z.string(),
  version: z.number().int(),
  status: z.string().nullable(),
  complexity: z.string().nullable(),
  checksum: z.string(),
  tags: z.array(z.string()).default([]),
});

export const ManifestSchema = z.object({
  convention_version: z.string(),
  generated_at: TimestampSchema,
  generator: z.string(),
  root_checksum: z.string(),
  documents: z.array(ManifestEntrySchema).default([]),
  active_set: z.array(z.string()).default([]),
  relations: z
    .array(z.object({ from: z.string(), to: z.string(), type: z.string() }))
    .default([]),
});

export function parseManifest(text: string, source: string): Manifest {
  let data: unknown;
  try {
    data = yaml.load(text, { schema: yaml.DEFAULT_SCHEMA });
  } catch (err) {
    throw new ManifestFormatError(
      source,
      `invalid YAML: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const result = ManifestSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ManifestFormatError(source, `not a valid manifest (${detail})`);
  }
  return result.data;
}

export function readManifest(filePath: string): Manifest {
  return parseManifest(readFileSync(filePath, "utf-8"), filePath);
}

// --- Files ---

export function manifestPath(root: string): string {
  return join(root, MANIFEST_FILE);
}

export function statePath(aictxDir: string): string {
  return join(aictxDir, STATE_DIR, STATE_FILE);
}

export function writeManifest(root: string, manifest: Manifest): string {
  const path = manifestPath(root);
  writeFileSync(path, manifestToYaml(manifest), "utf-8");
  return path;
}

export function saveState(aictxDir: string, manifest: Manifest): string {
  mkdirSync(join(aictxDir, STATE_DIR), { recursive: true });
  const path = statePath(aictxDir);
  writeFileSync(path, manifestToYaml(manifest), "utf-8");
  return path;
}

export function loadLastManifest(aictxDir: string): Manifest | null {
  const path = statePath(aictxDir);
  if (!existsSync(path)) return null;
  return readManifest(path);
}
