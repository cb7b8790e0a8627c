// Document listing for the `list` command.

import { compareKeys } from "./checksum.js";
import { toManifestPath } from "./manifest.js";
import type { DocumentIndex } from "./model.js";

export interface ListFilters {
  status?: string;
  kind?: string;
}

export interface ListRow {
  id: string;
  kind: string;
  status: string | null;
  path: string;
  complexity: string | null;
}

export function listDocuments(
  root: string,
  index: DocumentIndex,
  filters: ListFilters = {}
): ListRow[] {
  const rows: ListRow[] = [];
  for (const key of [...index.keys()].sort(compareKeys)) {
    const doc = index.get(key);
    if (!doc) continue;
    if (filters.status && doc.status !== filters.status) continue;
    if (filters.kind && doc.kind !== filters.kind) continue;
    rows.push({
      id: key,
      kind: doc.kind,
      status: doc.status,
      path: toManifestPath(root, doc.path),
      complexity: doc.complexity,
    });
  }
  return rows;
}

/** Plain-text table: id, kind, status, path. */
export function formatTable(rows: ListRow[]): string[] {
  if (rows.length === 0) return ["No documents match."];

  const width = (header: string, cell: (row: ListRow) => string) =>
    Math.max(header.length, ...rows.map((row) => cell(row).length));
  const wId = width("id", (r) => r.id);
  const wKind = width("kind", (r) => r.kind);
  const wStatus = width("status", (r) => r.status ?? "");

  const line = (id: string, kind: string, status: string, path: string) =>
    `${id.padEnd(wId)}  ${kind.padEnd(wKind)}  ${status.padEnd(wStatus)}  ${path}`;

  return [
    line("id", "kind", "status", "path"),
    ...rows.map((r) => line(r.id, r.kind, r.status ?? "", r.path)),
  ];
}
