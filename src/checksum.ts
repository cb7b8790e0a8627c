// Content checksums, per document and aggregated over the eligible set.
// Output must be identical across platforms and line-ending conventions.

import { createHash, type Hash } from "node:crypto";
import { readFileSync } from "node:fs";
import { basename, dirname } from "node:path";
import {
  TASK_ARTIFACT_KINDS,
  type ContextDocument,
  type DocumentIndex,
} from "./model.js";

export type ChecksumMode = "active" | "all";

// Unicode whitespace plus the ASCII separators U+001C..U+001F and U+0085.
// U+FEFF is content.
const WS = "\\t\\n\\v\\f\\r\\x1c-\\x1f \\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000";
const EDGE_WHITESPACE = new RegExp(`^[${WS}]+|[${WS}]+$`, "g");

export function normalizeContent(content: string): string {
  return content
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .replace(EDGE_WHITESPACE, "");
}

function digest(hash: Hash): string {
  return `sha256:${hash.digest("hex")}`;
}

export function contentChecksum(content: string): string {
  return digest(createHash("sha256").update(normalizeContent(content), "utf8"));
}

export function fileChecksum(filePath: string): string {
  return contentChecksum(readFileSync(filePath, "utf-8"));
}

// --- Eligibility ---

const SPEC_KEY_SUFFIX = "-spec";

/** Task ids (key without "-spec") of every spec whose status is active. */
export function activeTaskIds(index: DocumentIndex): Set<string> {
  const ids = new Set<string>();
  for (const [key, doc] of index) {
    if (doc.kind === "spec" && doc.status === "active") {
      ids.add(
        key.endsWith(SPEC_KEY_SUFFIX) ? key.slice(0, -SPEC_KEY_SUFFIX.length) : key
      );
    }
  }
  return ids;
}

function isTaskArtifactKind(kind: string): boolean {
  return TASK_ARTIFACT_KINDS.some((k) => k === kind);
}

/**
 * Rules always count; specs only when active; task artifacts only when the
 * task directory they live in has an active spec. Other kinds never count in
 * "active" mode.
 */
export function isEligible(
  doc: ContextDocument,
  activeTasks: Set<string>,
  mode: ChecksumMode = "active"
): boolean {
  if (mode === "all") return true;
  if (doc.kind === "rule") return true;
  if (doc.kind === "spec") return doc.status === "active";
  if (isTaskArtifactKind(doc.kind)) {
    return activeTasks.has(basename(dirname(doc.path)));
  }
  return false;
}

export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Keys of eligible documents, sorted. */
export function eligibleKeys(
  index: DocumentIndex,
  mode: ChecksumMode = "active"
): string[] {
  const activeTasks = activeTaskIds(index);
  const keys: string[] = [];
  for (const [key, doc] of index) {
    if (isEligible(doc, activeTasks, mode)) keys.push(key);
  }
  return keys.sort(compareKeys);
}

/**
 * One SHA-256 over the normalized content of every eligible document,
 * concatenated in key order.
 */
export function aggregateChecksum(
  index: DocumentIndex,
  mode: ChecksumMode = "active"
): string {
  const hash = createHash("sha256");
  for (const key of eligibleKeys(index, mode)) {
    const doc = index.get(key);
    if (doc) hash.update(normalizeContent(doc.content), "utf8");
  }
  return digest(hash);
}
