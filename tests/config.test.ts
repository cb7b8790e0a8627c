import { afterEach, describe, it, expect } from "vitest";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import {
  defaultConfig,
  findAictxDir,
  findContextRoot,
  loadConfig,
  logLevelFromEnv,
  parseConfig,
} from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { createLogger } from "../src/logger.js";
import { cleanupTempDirs, makeTempDir, writeTree } from "./helpers.js";

afterEach(cleanupTempDirs);

describe("parseConfig", () => {
  it("defaults everything", () => {
    expect(parseConfig(null, "c.yaml")).toEqual(defaultConfig());
    expect(defaultConfig()).toEqual({
      convention_version: "0.0.1",
      adapters: ["cursor", "copilot"],
      plugins: [],
    });
  });

  it("stringifies a numeric convention version", () => {
    expect(parseConfig({ convention_version: 1.2 }, "c.yaml").convention_version).toBe("1.2");
  });

  it("falls back to built-in adapters for an empty list", () => {
    expect(parseConfig({ adapters: [] }, "c.yaml").adapters).toEqual(["cursor", "copilot"]);
    expect(parseConfig({ adapters: ["claude"] }, "c.yaml").adapters).toEqual(["claude"]);
  });

  it("reports every invalid field", () => {
    let caught: unknown;
    try {
      parseConfig({ adapters: "cursor", plugins: [1] }, "c.yaml");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.message).toBe("Invalid configuration in c.yaml");
    expect(caught.issues.map((issue) => issue.path)).toEqual(["adapters", "plugins.0"]);
    expect(caught.format().split("\n")[0]).toBe("Invalid configuration in c.yaml");
    expect(caught.format().split("\n")[1]).toMatch(/^ {2}- adapters: /);
  });
});

describe("loadConfig", () => {
  it("returns defaults when config.yaml is absent", () => {
    expect(loadConfig(join(makeTempDir(), ".aictx"))).toEqual(defaultConfig());
  });

  it("reads config.yaml", () => {
    const root = makeTempDir();
    writeTree(root, {
      ".aictx/config.yaml": "convention_version: '0.2.0'\nadapters: [cursor]\nproject: Demo\n",
    });
    expect(loadConfig(join(root, ".aictx"))).toEqual({
      convention_version: "0.2.0",
      adapters: ["cursor"],
      plugins: [],
      project: "Demo",
    });
  });

  it("rejects invalid YAML", () => {
    const root = makeTempDir();
    writeTree(root, { ".aictx/config.yaml": "adapters: [cursor\n" });
    expect(() => loadConfig(join(root, ".aictx"))).toThrow(ConfigError);
  });
});

describe("root discovery", () => {
  it("finds .aictx walking upward", () => {
    const root = makeTempDir();
    mkdirSync(join(root, ".aictx"));
    mkdirSync(join(root, "a", "b"), { recursive: true });
    expect(findAictxDir(join(root, "a", "b"))).toBe(join(root, ".aictx"));
  });

  it("finds the nearest directory with rules/ or tasks/", () => {
    const root = makeTempDir();
    mkdirSync(join(root, "tasks", "T"), { recursive: true });
    expect(findContextRoot(join(root, "tasks", "T"))).toBe(root);
    expect(findContextRoot(root)).toBe(root);
  });

  it("prefers an explicit root", () => {
    expect(findContextRoot("/anywhere", "/ctx")).toBe("/ctx");
  });
});

describe("logLevelFromEnv", () => {
  it("reads AICTX_LOG_LEVEL", () => {
    expect(logLevelFromEnv({ AICTX_LOG_LEVEL: "debug" })).toBe("debug");
    expect(logLevelFromEnv({})).toBe("info");
    expect(logLevelFromEnv({ AICTX_LOG_LEVEL: "" }, "warn")).toBe("warn");
  });

  it("rejects unknown levels", () => {
    expect(() => logLevelFromEnv({ AICTX_LOG_LEVEL: "loud" })).toThrow(
      "Invalid AICTX_LOG_LEVEL: loud. Must be debug, info, warn, or error."
    );
  });
});

describe("createLogger", () => {
  it("filters by level and tags warnings and errors", () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: "info",
      write: {
        write: (chunk: string) => {
          lines.push(chunk);
          return true;
        },
      },
    });
    logger.debug("hidden");
    logger.info("plain");
    logger.warn("careful");
    logger.error("broken");
    expect(lines).toEqual([
      "[aictx] plain\n",
      "[aictx] warning: careful\n",
      "[aictx] error: broken\n",
    ]);
  });
});
