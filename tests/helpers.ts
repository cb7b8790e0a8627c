import { cpSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { CommandContext, CommandOutput } from "../src/commands.js";
import { defaultConfig } from "../src/config.js";
import type { Observer } from "../src/hooks.js";
import { silentLogger } from "../src/logger.js";

export const BASIC_DIR = fileURLToPath(new URL("./fixtures/basic", import.meta.url));

const tempDirs: string[] = [];

export function makeTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "aictx-test-"));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

/** Copy the basic fixture into a fresh temp dir and return the copy's path. */
export function copyBasicFixture(): string {
  const root = join(makeTempDir(), "context");
  cpSync(BASIC_DIR, root, { recursive: true });
  return root;
}

export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, "utf-8");
  }
}

/** Markdown file with the given frontmatter lines and body. */
export function md(frontmatter: string[], body = "Body.\n"): string {
  return ["---", ...frontmatter, "---", body].join("\n");
}

export interface CapturedOutput extends CommandOutput {
  stdout: string[];
  stderr: string[];
}

export function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => {
      stdout.push(line);
    },
    err: (line) => {
      stderr.push(line);
    },
  };
}

export function makeContext(
  root: string,
  overrides: Partial<CommandContext> = {}
): CommandContext & { output: CapturedOutput } {
  const output = captureOutput();
  const observers: Observer[] = [];
  return {
    root,
    aictxDir: join(root, ".aictx"),
    config: defaultConfig(),
    observers,
    logger: silentLogger,
    now: () => new Date("2026-03-01T12:00:00.000Z"),
    ...overrides,
    output,
  };
}
