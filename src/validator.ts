// Convention validator: schema, required artifacts per complexity tier, and
// reference integrity. Parse errors short-circuit; domain errors accumulate.

import { existsSync } from "node:fs";
import { basename, join } from "node:path";
import { IntegrityError } from "./errors.js";
import {
  buildIndex,
  collectTaskDirs,
  requiredFilesForComplexity,
} from "./indexer.js";
import { validateSchema } from "./parser.js";
import type { DocumentIndex, ValidationResult } from "./model.js";

const DEFAULT_COMPLEXITY = "normal";

/**
 * True if `ref` is an index key, or names a task whose spec is indexed
 * (`<ref>-spec`). The fallback only goes one way.
 */
export function refExists(ref: string, index: DocumentIndex): boolean {
  return index.has(ref) || index.has(`${ref}-spec`);
}

export function validateSchemas(index: DocumentIndex): string[] {
  const errors: string[] = [];
  for (const doc of index.values()) {
    const err = validateSchema(doc);
    if (err) errors.push(err.message);
  }
  return errors;
}

export function validateRequiredFiles(
  root: string,
  index: DocumentIndex
): string[] {
  const errors: string[] = [];
  for (const taskDir of collectTaskDirs(root)) {
    const spec = index.get(`${basename(taskDir)}-spec`);
    if (!spec) continue;
    const complexity = spec.complexity || DEFAULT_COMPLEXITY;
    for (const file of requiredFilesForComplexity(complexity)) {
      const path = join(taskDir, file);
      if (!existsSync(path)) {
        errors.push(
          new IntegrityError(
            path,
            `required file missing (complexity=${complexity})`
          ).message
        );
      }
    }
  }
  return errors;
}

export function validateReferences(index: DocumentIndex): string[] {
  const errors: string[] = [];
  for (const doc of index.values()) {
    for (const ref of doc.references) {
      if (!refExists(ref, index)) {
        errors.push(
          new IntegrityError(doc.path, `reference to unknown id ${ref}`).message
        );
      }
    }
  }
  return errors;
}

/**
 * Index `root` and validate it. When indexing reports errors those are
 * returned as-is and the remaining checks are skipped.
 */
export function validate(root: string): ValidationResult {
  const { index, errors: parseErrors } = buildIndex(root);
  if (parseErrors.length > 0) {
    return { ok: false, errors: parseErrors, index };
  }

  const errors = [
    ...validateSchemas(index),
    ...validateRequiredFiles(root, index),
    ...validateReferences(index),
  ];
  return { ok: errors.length === 0, errors, index };
}
