// Discovery and indexing: walk rules/ and tasks/, parse every candidate file
// and key it. A bad file becomes one error string; indexing never throws.

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { basename, join } from "node:path";
import { IntegrityError } from "./errors.js";
import { parseDocument } from "./parser.js";
import {
  TASK_ARTIFACT_KINDS,
  type Complexity,
  type ContextDocument,
  type DocumentIndex,
  type IndexResult,
  type TaskArtifactKind,
} from "./model.js";

export const TASK_SPEC_FILE = "spec.md";

export function artifactFile(kind: TaskArtifactKind): string {
  return `${kind}.md`;
}

// Listed in canonical order so required-file errors come out deterministically.
const TRIVIAL_FILES = ["spec.md", "implementation.md"];
const NORMAL_FILES = ["spec.md", "plan.md", "implementation.md", "tests-review.md"];
const CRITICAL_FILES = [
  "spec.md",
  "context.md",
  "plan.md",
  "implementation.md",
  "review.md",
  "tests-review.md",
];

export function requiredFilesForComplexity(
  complexity: Complexity | string | null
): string[] {
  if (complexity === "trivial") return TRIVIAL_FILES;
  if (complexity === "critical") return CRITICAL_FILES;
  return NORMAL_FILES;
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function sortedEntries(dir: string) {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => !entry.name.startsWith("."))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/** `*.md` files directly under rules/, sorted by name. */
export function collectRules(root: string): string[] {
  const rulesDir = join(root, "rules");
  if (!isDirectory(rulesDir)) return [];
  return sortedEntries(rulesDir)
    .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
    .map((entry) => join(rulesDir, entry.name));
}

/** Subdirectories of tasks/ that hold a spec.md, sorted by name. */
export function collectTaskDirs(root: string): string[] {
  const tasksDir = join(root, "tasks");
  if (!isDirectory(tasksDir)) return [];
  return sortedEntries(tasksDir)
    .filter((entry) => entry.isDirectory())
    .map((entry) => join(tasksDir, entry.name))
    .filter((dir) => existsSync(join(dir, TASK_SPEC_FILE)));
}

function describeFailure(path: string, err: unknown): string {
  return `${path}: ${err instanceof Error ? err.message : String(err)}`;
}

class IndexBuilder {
  readonly index: DocumentIndex = new Map();
  readonly errors: string[] = [];

  /** Parse `path` and store it under the key `keyFor` picks. First key wins. */
  add(
    path: string,
    keyFor: (doc: ContextDocument) => string,
    duplicateLabel: "id" | "key"
  ): void {
    let doc: ContextDocument;
    try {
      doc = parseDocument(path, readFileSync(path, "utf-8"));
    } catch (err) {
      this.errors.push(describeFailure(path, err));
      return;
    }
    const key = keyFor(doc);
    if (this.index.has(key)) {
      this.errors.push(
        new IntegrityError(path, `duplicate ${duplicateLabel} ${key}`).message
      );
      return;
    }
    this.index.set(key, doc);
  }
}

/**
 * Build the key → document index for a convention root. Rules key by their
 * own id; task documents key by `<dirname>-<artifact>`.
 */
export function buildIndex(root: string): IndexResult {
  const builder = new IndexBuilder();

  for (const path of collectRules(root)) {
    builder.add(path, (doc) => doc.id, "id");
  }

  for (const taskDir of collectTaskDirs(root)) {
    const taskName = basename(taskDir);
    builder.add(join(taskDir, TASK_SPEC_FILE), () => `${taskName}-spec`, "id");

    for (const artifact of TASK_ARTIFACT_KINDS) {
      const path = join(taskDir, artifactFile(artifact));
      if (!existsSync(path)) continue;
      builder.add(path, () => `${taskName}-${artifact}`, "key");
    }
  }

  return { index: builder.index, errors: builder.errors };
}
