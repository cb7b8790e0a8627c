// Document content reading for MCP resource responses, with a path guard.

import { readFileSync } from "node:fs";
import { resolve, sep } from "node:path";
import { DOCUMENT_MIME } from "./mapper.js";
import type { ContextDocument } from "./model.js";

export interface TextContent {
  uri: string;
  mimeType: string;
  text: string;
}

/**
 * Read a document's current text from disk.
 * Throws if the path escapes the convention root or the file is gone.
 */
export function readDocumentContent(
  root: string,
  key: string,
  doc: ContextDocument,
  resourceUri: string
): TextContent {
  const rootDir = resolve(root);
  const resolved = resolve(doc.path);

  if (!resolved.startsWith(rootDir + sep)) {
    throw new Error(`Path traversal rejected for document '${key}'`);
  }

  return {
    uri: resourceUri,
    mimeType: DOCUMENT_MIME,
    text: readFileSync(resolved, "utf-8"),
  };
}
