// Context document parser: YAML frontmatter + Markdown body
// Parsing only checks structure; per-kind schema rules live in validateSchema().

import yaml from "js-yaml";
import { FormatError, SchemaError } from "./errors.js";
import {
  COMPLEXITY_VALUES,
  STATUS_VALUES,
  type ContextDocument,
  type RawFrontmatter,
} from "./model.js";

const FRONTMATTER_DELIM = "---";

// --- Raw YAML helpers ---

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string {
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

function asOptionalText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return asText(value).trim();
}

export function asStringArray(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.map(asText);
  return [asText(value)];
}

/** Positive integer or 1. Never throws. */
export function normalizeVersion(value: unknown): number {
  let n: number;
  if (typeof value === "number") {
    n = Math.trunc(value);
  } else if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    n = parseInt(value, 10);
  } else {
    return 1;
  }
  return Number.isFinite(n) && n >= 1 ? n : 1;
}

// --- Frontmatter ---

export interface SplitFrontmatter {
  frontmatter: RawFrontmatter;
  body: string;
}

/**
 * Split `---`-delimited YAML frontmatter from the body.
 * Throws FormatError on missing delimiters, invalid YAML or a non-mapping block.
 */
export function parseFrontmatter(content: string): SplitFrontmatter {
  const lines = content.trim().split("\n");
  const isDelimiter = (line: string) => line.trimEnd() === FRONTMATTER_DELIM;
  if (!isDelimiter(lines[0] ?? "")) {
    throw new FormatError("Missing opening frontmatter delimiter ---");
  }
  // Closing delimiter must be a whole line; "---x" or "----" stay in the block.
  const closeIdx = lines.findIndex((line, i) => i > 0 && isDelimiter(line));
  if (closeIdx === -1) {
    throw new FormatError("Missing closing frontmatter delimiter ---");
  }
  const block = lines.slice(1, closeIdx).join("\n").trim();
  const body = lines
    .slice(closeIdx + 1)
    .join("\n")
    .replace(/^[\r\n]+/, "");

  let data: unknown;
  try {
    data = yaml.load(block, { schema: yaml.DEFAULT_SCHEMA });
  } catch (err) {
    throw new FormatError(
      `Invalid YAML in frontmatter: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (data === null || data === undefined) {
    return { frontmatter: {}, body };
  }
  if (!isRecord(data)) {
    throw new FormatError("Frontmatter must be a YAML mapping");
  }
  return { frontmatter: data, body };
}

// --- Public API ---

/**
 * Parse one file's content into a ContextDocument, applying defaults
 * (version 1, empty tags/references). Does not check the per-kind schema.
 */
export function parseDocument(filePath: string, content: string): ContextDocument {
  const { frontmatter, body } = parseFrontmatter(content);
  const rawId = frontmatter["id"];
  const rawKind = frontmatter["kind"];
  const id = rawId ? asText(rawId).trim() : "";
  const kind = rawKind ? asText(rawKind).trim() : "";
  if (!id || !kind) {
    throw new FormatError("Frontmatter must contain id and kind");
  }

  return {
    path: filePath,
    id,
    kind,
    version: normalizeVersion(frontmatter["version"]),
    status: asOptionalText(frontmatter["status"]),
    complexity: asOptionalText(frontmatter["complexity"]),
    tags: asStringArray(frontmatter["tags"]),
    references: asStringArray(frontmatter["references"]),
    owner: asOptionalText(frontmatter["owner"]),
    body,
    content,
    raw_frontmatter: frontmatter,
  };
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((v) => v === value);
}

/** First schema violation for the document's kind, or null. */
export function validateSchema(doc: ContextDocument): SchemaError | null {
  if (doc.kind === "spec") {
    if (!doc.id) return new SchemaError(doc.path, "spec requires field: id");
    if (doc.status === null) {
      return new SchemaError(doc.path, "spec requires field: status");
    }
    if (doc.complexity === null) {
      return new SchemaError(doc.path, "spec requires field: complexity");
    }
    if (!isOneOf(STATUS_VALUES, doc.status)) {
      return new SchemaError(
        doc.path,
        `status must be one of ${STATUS_VALUES.join(", ")}`
      );
    }
    if (!isOneOf(COMPLEXITY_VALUES, doc.complexity)) {
      return new SchemaError(
        doc.path,
        `complexity must be one of ${COMPLEXITY_VALUES.join(", ")}`
      );
    }
    return null;
  }
  if (doc.kind === "rule") {
    return doc.id ? null : new SchemaError(doc.path, "rule requires field: id");
  }
  if (!doc.id || !doc.kind) {
    return new SchemaError(doc.path, "document must have id and kind");
  }
  return null;
}
