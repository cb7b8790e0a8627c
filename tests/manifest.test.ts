import { afterEach, describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { aggregateChecksum, fileChecksum } from "../src/checksum.js";
import { ManifestFormatError } from "../src/errors.js";
import { buildIndex } from "../src/indexer.js";
import {
  GENERATOR,
  buildManifest,
  collectRelations,
  formatTimestamp,
  loadLastManifest,
  manifestToYaml,
  parseManifest,
  readManifest,
  saveState,
  statePath,
  toManifestPath,
  writeManifest,
} from "../src/manifest.js";
import { BASIC_DIR, cleanupTempDirs, copyBasicFixture, makeTempDir } from "./helpers.js";

afterEach(cleanupTempDirs);

const NOW = new Date("2026-03-01T12:00:00.000Z");

describe("buildManifest", () => {
  const { index } = buildIndex(BASIC_DIR);
  const manifest = buildManifest(BASIC_DIR, index, { now: NOW });

  it("fills the header fields", () => {
    expect(manifest.convention_version).toBe("0.0.1");
    expect(manifest.generated_at).toBe("2026-03-01T12:00:00Z");
    expect(manifest.generator).toBe(GENERATOR);
    expect(manifest.root_checksum).toBe(aggregateChecksum(index, "active"));
  });

  it("takes the convention version from options", () => {
    expect(
      buildManifest(BASIC_DIR, index, { now: NOW, conventionVersion: "2.1" })
        .convention_version
    ).toBe("2.1");
  });

  it("lists documents sorted by key", () => {
    expect(manifest.documents.map((d) => d.id)).toEqual([
      "R-coding",
      "R-review",
      "TASK-1-implementation",
      "TASK-1-plan",
      "TASK-1-spec",
      "TASK-1-tests-review",
      "TASK-2-implementation",
      "TASK-2-spec",
    ]);
  });

  it("records per-document metadata and checksums", () => {
    expect(manifest.documents[0]).toEqual({
      id: "R-coding",
      kind: "rule",
      path: "rules/coding-style.md",
      version: 2,
      status: null,
      complexity: null,
      checksum: fileChecksum(join(BASIC_DIR, "rules", "coding-style.md")),
      tags: ["style", "typescript"],
    });
    expect(manifest.documents[4]).toMatchObject({
      id: "TASK-1-spec",
      kind: "spec",
      path: "tasks/TASK-1/spec.md",
      status: "active",
      complexity: "normal",
      tags: ["api"],
    });
  });

  it("puts only active specs in the active set", () => {
    expect(manifest.active_set).toEqual(["TASK-1-spec"]);
  });

  it("emits one uses relation per reference, in index order", () => {
    expect(manifest.relations).toEqual([
      { from: "R-review", to: "TASK-1", type: "uses" },
      { from: "TASK-1-spec", to: "R-coding", type: "uses" },
      { from: "TASK-1-plan", to: "TASK-1", type: "uses" },
    ]);
    expect(collectRelations(new Map())).toEqual([]);
  });

  it("is deterministic for the same tree and clock", () => {
    expect(buildManifest(BASIC_DIR, buildIndex(BASIC_DIR).index, { now: NOW })).toEqual(
      manifest
    );
  });
});

describe("formatTimestamp", () => {
  it("drops milliseconds", () => {
    expect(formatTimestamp(new Date("2026-01-31T09:30:00.123Z"))).toBe(
      "2026-01-31T09:30:00Z"
    );
  });
});

describe("toManifestPath", () => {
  it("is relative with forward slashes", () => {
    expect(toManifestPath(BASIC_DIR, join(BASIC_DIR, "tasks", "TASK-1", "plan.md"))).toBe(
      "tasks/TASK-1/plan.md"
    );
  });
});

describe("persistence", () => {
  it("writes manifests.yaml at the root and reads it back", () => {
    const root = copyBasicFixture();
    const manifest = buildManifest(root, buildIndex(root).index, { now: NOW });
    const path = writeManifest(root, manifest);
    expect(path).toBe(join(root, "manifests.yaml"));
    expect(readManifest(path)).toEqual(manifest);
  });

  it("keeps the field order of the manifest in YAML", () => {
    const manifest = buildManifest(BASIC_DIR, buildIndex(BASIC_DIR).index, { now: NOW });
    const topLevel = manifestToYaml(manifest)
      .split("\n")
      .filter((line) => /^[a-z_]+:/.test(line))
      .map((line) => line.slice(0, line.indexOf(":")));
    expect(topLevel).toEqual([
      "convention_version",
      "generated_at",
      "generator",
      "root_checksum",
      "documents",
      "active_set",
      "relations",
    ]);
  });

  it("saves and loads the last-build state", () => {
    const aictxDir = join(makeTempDir(), ".aictx");
    expect(loadLastManifest(aictxDir)).toBeNull();

    const manifest = buildManifest(BASIC_DIR, buildIndex(BASIC_DIR).index, { now: NOW });
    const path = saveState(aictxDir, manifest);
    expect(path).toBe(statePath(aictxDir));
    expect(path).toBe(join(aictxDir, "state", "last_manifest.yaml"));
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, "utf-8")).toBe(manifestToYaml(manifest));
    expect(loadLastManifest(aictxDir)).toEqual(manifest);
  });
});

describe("parseManifest", () => {
  const minimal = [
    "convention_version: '1.0'",
    "generated_at: 2026-01-31T09:30:00Z",
    "generator: aictx 1.0",
    "root_checksum: sha256:00",
  ].join("\n");

  it("fills missing lists and accepts an unquoted timestamp", () => {
    expect(parseManifest(minimal, "m.yaml")).toEqual({
      convention_version: "1.0",
      generated_at: "2026-01-31T09:30:00Z",
      generator: "aictx 1.0",
      root_checksum: "sha256:00",
      documents: [],
      active_set: [],
      relations: [],
    });
  });

  it("rejects invalid YAML", () => {
    expect(() => parseManifest("documents: [", "m.yaml")).toThrow(ManifestFormatError);
    expect(() => parseManifest("documents: [", "m.yaml")).toThrow(
      /^m\.yaml: invalid YAML: /
    );
  });

  it("rejects YAML that is not a manifest", () => {
    expect(() => parseManifest("- a\n- b\n", "m.yaml")).toThrow(
      /^m\.yaml: not a valid manifest \(/
    );
    expect(() => parseManifest(`${minimal}\ndocuments: [{ id: A }]\n`, "m.yaml")).toThrow(
      /documents\.0\.kind/
    );
  });
});
