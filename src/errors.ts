// Error taxonomy. Format/schema/integrity problems end up as strings in an
// error list; export and configuration errors are thrown to the caller.

/** Malformed frontmatter: missing delimiters, bad YAML, no id or kind. */
export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

/** A required field is missing or an enum-constrained field is out of range. */
export class SchemaError extends Error {
  readonly path: string;
  readonly detail: string;

  constructor(path: string, detail: string) {
    super(`${path}: ${detail}`);
    this.name = "SchemaError";
    this.path = path;
    this.detail = detail;
  }
}

/** Duplicate key, missing required artifact file or unresolved reference. */
export class IntegrityError extends Error {
  readonly path: string;
  readonly detail: string;

  constructor(path: string, detail: string) {
    super(`${path}: ${detail}`);
    this.name = "IntegrityError";
    this.path = path;
    this.detail = detail;
  }
}

/** A declared export source does not exist. Raised before anything is copied. */
export class ExportSourceError extends Error {
  readonly adapter: string;
  readonly source: string;

  constructor(adapter: string, source: string) {
    super(`Adapter ${adapter}: source not found: ${source}`);
    this.name = "ExportSourceError";
    this.adapter = adapter;
    this.source = source;
  }
}

export class AdapterDeclarationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AdapterDeclarationError";
  }
}

export class ManifestFormatError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`${path}: ${detail}`);
    this.name = "ManifestFormatError";
    this.path = path;
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path || "(root)"}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}
