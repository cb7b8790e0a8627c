// aictx context server
// Validates a convention root and exposes its documents as read-only MCP resources.

import { basename, resolve } from "node:path";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { activeTaskIds, compareKeys, isEligible } from "./checksum.js";
import { DEFAULT_CONVENTION_VERSION, buildManifest } from "./manifest.js";
import {
  MANIFEST_MIME,
  buildDocumentResource,
  buildManifestResource,
  buildManifestUri,
  manifestToJson,
  parseDocumentUri,
  toProjectSlug,
  type McpResourceMeta,
} from "./mapper.js";
import { readDocumentContent } from "./content.js";
import { silentLogger, type Logger } from "./logger.js";
import { validate } from "./validator.js";
import type { DocumentIndex, Manifest } from "./model.js";

export interface ContextServerOptions {
  /** Only expose documents that count towards the active root checksum */
  activeOnly?: boolean;
  project?: string;
  conventionVersion?: string;
  logger?: Logger;
}

export interface ContextMcpServer {
  server: Server;
  manifest: Manifest;
  index: DocumentIndex;
  projectSlug: string;
}

/**
 * Create an MCP Server over the documents of a convention root.
 * Throws when the root does not validate.
 */
export function createContextServer(
  root: string,
  options: ContextServerOptions = {}
): ContextMcpServer {
  const {
    activeOnly = false,
    conventionVersion = DEFAULT_CONVENTION_VERSION,
    logger = silentLogger,
  } = options;
  const rootDir = resolve(root);
  const project = options.project ?? basename(rootDir);

  const result = validate(rootDir);
  if (!result.ok) {
    throw new Error(`Invalid context root ${rootDir}:\n${result.errors.join("\n")}`);
  }
  const { index } = result;
  const manifest = buildManifest(rootDir, index, { conventionVersion });
  const projectSlug = toProjectSlug(project) || "context";

  const activeTasks = activeTaskIds(index);
  const resourceList: McpResourceMeta[] = [
    buildManifestResource(manifest, project, projectSlug),
  ];
  const exposed = new Set<string>();
  for (const [key, doc] of [...index].sort(([a], [b]) => compareKeys(a, b))) {
    const eligible = isEligible(doc, activeTasks);
    if (activeOnly && !eligible) continue;
    exposed.add(key);
    resourceList.push(buildDocumentResource(key, doc, projectSlug, eligible));
  }

  const server = new Server(
    { name: `aictx-${projectSlug}`, version: "1.0.0" },
    {
      capabilities: {
        resources: {},
      },
    }
  );

  const manifestUri = buildManifestUri(projectSlug);
  logger.info(
    `Serving '${project}': ${exposed.size} document(s)` +
      (activeOnly ? " (active-only filter)" : "")
  );
  logger.info(`Start with: ${manifestUri}`);

  // --- handlers ---

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: resourceList,
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;

    if (uri === manifestUri) {
      return {
        contents: [{ uri, mimeType: MANIFEST_MIME, text: manifestToJson(manifest) }],
      };
    }

    const key = parseDocumentUri(projectSlug, uri);
    if (key === null) {
      throw new Error(`Unknown resource URI: ${uri}`);
    }
    const doc = exposed.has(key) ? index.get(key) : undefined;
    if (!doc) {
      throw new Error(`No document with key '${key}'`);
    }

    const content = readDocumentContent(rootDir, key, doc, uri);
    return {
      contents: [{ uri: content.uri, mimeType: content.mimeType, text: content.text }],
    };
  });

  return { server, manifest, index, projectSlug };
}
