// aictx data model: parsed documents, the index, manifests, export payloads

export const STATUS_VALUES = ["active", "historical", "obsolete"] as const;
export const COMPLEXITY_VALUES = ["trivial", "normal", "critical"] as const;
export const TASK_ARTIFACT_KINDS = [
  "context",
  "plan",
  "implementation",
  "review",
  "tests-review",
] as const;

export type DocumentStatus = (typeof STATUS_VALUES)[number];
export type Complexity = (typeof COMPLEXITY_VALUES)[number];
export type TaskArtifactKind = (typeof TASK_ARTIFACT_KINDS)[number];

export type RawFrontmatter = Record<string, unknown>;

/**
 * One parsed Markdown file. `status` and `complexity` hold whatever the
 * frontmatter said; enum membership is checked by `validateSchema`, not by
 * the parser.
 */
export interface ContextDocument {
  path: string;
  id: string;
  kind: string;            // "rule" | "spec" | TaskArtifactKind | anything else
  version: number;         // >= 1, defaults to 1
  status: string | null;
  complexity: string | null;
  tags: string[];          // defaults to []
  references: string[];    // defaults to []
  owner: string | null;
  body: string;
  content: string;         // full file text as read, used for checksums
  raw_frontmatter: RawFrontmatter;
}

/** Document key → document, in insertion (discovery) order. */
export type DocumentIndex = Map<string, ContextDocument>;

export interface IndexResult {
  index: DocumentIndex;
  errors: string[];
}

export interface ValidationResult {
  ok: boolean;
  errors: string[];
  index: DocumentIndex;
}

export interface Relation {
  from: string;
  to: string;
  type: string;            // always "uses" for now
}

export interface ManifestEntry {
  id: string;
  kind: string;
  path: string;            // relative to the convention root, forward slashes
  version: number;
  status: string | null;
  complexity: string | null;
  checksum: string;
  tags: string[];
}

export interface Manifest {
  convention_version: string;
  generated_at: string;    // YYYY-MM-DDTHH:MM:SSZ
  generator: string;
  root_checksum: string;
  documents: ManifestEntry[];
  active_set: string[];
  relations: Relation[];
}

export interface DiffReport {
  added: string[];
  removed: string[];
  changed: string[];
}

export interface ExportEntry {
  id: string;
  kind: string;
  source: string;
  target: string;
  version: number;
  status: string | null;
  complexity: string | null;
  checksum: string | null;
  tags: string[];
}

export interface ExportPayload {
  output_dir: string;
  documents: ExportEntry[];
}
