// Read-only comparison of the live index against the last built manifest.

import { compareKeys, contentChecksum } from "./checksum.js";
import type { DiffReport, DocumentIndex, Manifest } from "./model.js";

export function diffManifest(index: DocumentIndex, last: Manifest): DiffReport {
  const stored = new Map(last.documents.map((d) => [d.id, d.checksum]));

  const added = [...index.keys()].filter((key) => !stored.has(key));
  const removed = [...stored.keys()].filter((key) => !index.has(key));
  const changed: string[] = [];
  for (const [key, doc] of index) {
    const checksum = stored.get(key);
    if (checksum !== undefined && checksum !== contentChecksum(doc.content)) {
      changed.push(key);
    }
  }

  return {
    added: added.sort(compareKeys),
    removed: removed.sort(compareKeys),
    changed: changed.sort(compareKeys),
  };
}

export function isEmptyDiff(report: DiffReport): boolean {
  return (
    report.added.length === 0 &&
    report.removed.length === 0 &&
    report.changed.length === 0
  );
}
