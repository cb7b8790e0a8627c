// Export adapters: copy the declared document subset to an external tool's
// directory. Every source is checked before the first write.

import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { dirname, isAbsolute, join, resolve, sep } from "node:path";
import { z } from "zod";
import { contentChecksum } from "./checksum.js";
import { AdapterDeclarationError, ExportSourceError } from "./errors.js";
import type {
  ContextDocument,
  DocumentIndex,
  ExportEntry,
  ExportPayload,
} from "./model.js";

export const BUILTIN_ADAPTERS = ["cursor", "copilot"] as const;
export const DECLARATION_FILE = "context.json";

const DeclaredDocumentSchema = z.object({
  source: z.string().min(1),
  id: z.string().optional(),
  kind: z.string().optional(),
  target: z.string().min(1).optional(),
  version: z.number().int().positive().optional(),
  tags: z.array(z.string()).optional(),
});

export const AdapterDeclarationSchema = z.object({
  output_dir: z.string().min(1),
  documents: z.array(DeclaredDocumentSchema).default([]),
});

export type DeclaredDocument = z.infer<typeof DeclaredDocumentSchema>;
export type AdapterDeclaration = z.infer<typeof AdapterDeclarationSchema>;

export function declarationPath(root: string, adapter: string): string {
  return join(root, "adapters", adapter, DECLARATION_FILE);
}

/** Read `adapters/<name>/context.json`. The file itself is never written. */
export function loadAdapterDeclaration(
  root: string,
  adapter: string
): AdapterDeclaration {
  const path = declarationPath(root, adapter);
  if (!existsSync(path)) {
    throw new AdapterDeclarationError(`Adapter spec not found: ${path}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new AdapterDeclarationError(
      `Adapter spec is not valid JSON: ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const result = AdapterDeclarationSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new AdapterDeclarationError(`Invalid adapter spec ${path}: ${detail}`);
  }
  return result.data;
}

export function resolveOutputDir(root: string, outputDir: string): string {
  return isAbsolute(outputDir) ? outputDir : join(root, outputDir);
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/** Destination of `target` under `outputDir`, or null if it would land outside. */
export function resolveTarget(outputDir: string, target: string): string | null {
  const base = resolve(outputDir);
  const dst = resolve(base, target);
  return dst.startsWith(base + sep) ? dst : null;
}

/**
 * Build the export payload from the declaration alone. Declared entries are
 * enriched from the index (by id, then by resolved source path); indexed
 * documents that are not declared are left out.
 */
export function buildPayload(
  declaration: AdapterDeclaration,
  root: string,
  index: DocumentIndex,
  adapter: string
): ExportPayload {
  const outputDir = resolveOutputDir(root, declaration.output_dir);
  const byPath = new Map<string, ContextDocument>();
  for (const doc of index.values()) byPath.set(resolve(doc.path), doc);

  const documents: ExportEntry[] = declaration.documents.map((entry) => {
    const srcPath = resolve(root, entry.source);
    if (!isFile(srcPath)) {
      throw new ExportSourceError(adapter, entry.source);
    }
    const target = entry.target ?? entry.source;
    if (resolveTarget(outputDir, target) === null) {
      throw new AdapterDeclarationError(
        `Adapter ${adapter}: target escapes output_dir: ${target}`
      );
    }
    const indexed =
      (entry.id !== undefined ? index.get(entry.id) : undefined) ??
      byPath.get(srcPath);

    const base = {
      id: entry.id ?? "",
      kind: entry.kind ?? "",
      source: entry.source,
      target,
    };
    if (indexed) {
      return {
        ...base,
        version: indexed.version,
        status: indexed.status,
        complexity: indexed.complexity,
        checksum: contentChecksum(indexed.content),
        tags: [...indexed.tags],
      };
    }
    return {
      ...base,
      version: entry.version ?? 1,
      status: null,
      complexity: null,
      checksum: null,
      tags: entry.tags ?? [],
    };
  });

  return { output_dir: declaration.output_dir, documents };
}

export interface ExportResult {
  outputDir: string;
  contextFile: string;
  payload: ExportPayload;
}

/**
 * Load the declaration, check every source, then copy the declared files and
 * write `<output_dir>/context.json`.
 */
export function runExport(
  root: string,
  index: DocumentIndex,
  adapter: string
): ExportResult {
  const declaration = loadAdapterDeclaration(root, adapter);
  const payload = buildPayload(declaration, root, index, adapter);

  const outputDir = resolveOutputDir(root, payload.output_dir);
  mkdirSync(outputDir, { recursive: true });
  for (const doc of payload.documents) {
    const dst = resolveTarget(outputDir, doc.target);
    if (dst === null) {
      throw new AdapterDeclarationError(
        `Adapter ${adapter}: target escapes output_dir: ${doc.target}`
      );
    }
    mkdirSync(dirname(dst), { recursive: true });
    copyFileSync(resolve(root, doc.source), dst);
  }

  const contextFile = join(outputDir, DECLARATION_FILE);
  writeFileSync(contextFile, JSON.stringify(payload, null, 2) + "\n", "utf-8");
  return { outputDir, contextFile, payload };
}
