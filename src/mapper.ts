// Context index → MCP resource mapping (pure functions, no I/O)

import type { ContextDocument, Manifest } from "./model.js";

export const DOCUMENT_MIME = "text/markdown";
export const MANIFEST_MIME = "application/json";

// --- URI construction ---

export function toProjectSlug(project: string): string {
  return project
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
}

// Document URIs sit under doc/; the manifest URI is never a document URI.
export function buildDocumentUri(projectSlug: string, key: string): string {
  return `aictx://${projectSlug}/doc/${encodeURIComponent(key)}`;
}

export function buildManifestUri(projectSlug: string): string {
  return `aictx://${projectSlug}/manifest`;
}

/** Document key from a document URI, or null if the URI is foreign. */
export function parseDocumentUri(projectSlug: string, uri: string): string | null {
  const prefix = `aictx://${projectSlug}/doc/`;
  if (!uri.startsWith(prefix)) return null;
  return decodeURIComponent(uri.slice(prefix.length));
}

// --- Priority ---

export function documentPriority(doc: ContextDocument, eligible: boolean): number {
  if (doc.kind === "rule") return 1.0;
  return eligible ? 0.8 : 0.3;
}

// --- Description construction ---

export function buildDescription(key: string, doc: ContextDocument): string {
  const parts: string[] = [`${doc.kind} ${key} (v${doc.version})`, ""];
  if (doc.status) parts.push(`Status: ${doc.status}`);
  if (doc.complexity) parts.push(`Complexity: ${doc.complexity}`);
  if (doc.owner) parts.push(`Owner: ${doc.owner}`);
  if (doc.tags.length > 0) parts.push(`Tags: ${doc.tags.join(", ")}`);
  if (doc.references.length > 0)
    parts.push(`References: ${doc.references.join(", ")}`);
  return parts.join("\n");
}

/** First Markdown heading of the body, else the key. */
export function documentTitle(key: string, doc: ContextDocument): string {
  const heading = /^#{1,6}\s+(.+)$/m.exec(doc.body);
  const title = heading?.[1]?.trim() || key;
  return title.length <= 80 ? title : title.slice(0, 77) + "...";
}

// --- MCP Resource shapes ---
// Plain objects matching the MCP resource schema, kept free of SDK types.

export interface McpResourceMeta {
  uri: string;
  name: string;
  title: string;
  description: string;
  mimeType: string;
  annotations: {
    audience: Array<"user" | "assistant">;
    priority: number;
  };
}

export function buildDocumentResource(
  key: string,
  doc: ContextDocument,
  projectSlug: string,
  eligible: boolean
): McpResourceMeta {
  return {
    uri: buildDocumentUri(projectSlug, key),
    name: key,
    title: documentTitle(key, doc),
    description: buildDescription(key, doc),
    mimeType: DOCUMENT_MIME,
    annotations: {
      audience: ["assistant"],
      priority: documentPriority(doc, eligible),
    },
  };
}

export function buildManifestResource(
  manifest: Manifest,
  project: string,
  projectSlug: string
): McpResourceMeta {
  const n = manifest.documents.length;
  return {
    uri: buildManifestUri(projectSlug),
    name: "manifest",
    title: `Context manifest: ${project}`,
    description:
      `Snapshot of all ${n} context document(s) in '${project}' ` +
      `(root checksum ${manifest.root_checksum}). ` +
      `Read this first: lists every document with status, complexity, checksum and relations.`,
    mimeType: MANIFEST_MIME,
    annotations: {
      audience: ["assistant", "user"],
      priority: 1.0,
    },
  };
}

export function manifestToJson(manifest: Manifest): string {
  return JSON.stringify(manifest, null, 2);
}
