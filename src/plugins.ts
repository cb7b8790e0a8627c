// Plugin descriptors from config.plugins, resolved at startup into observers.
// Nothing here runs inside the validate/build pipeline itself.

import { basename, extname, isAbsolute, join } from "node:path";
import { pathToFileURL } from "node:url";
import type { AictxConfig } from "./config.js";
import { HOOK_NAMES, onHook, type Observer } from "./hooks.js";
import type { Logger } from "./logger.js";
import { isRecord } from "./parser.js";

export interface PluginDescriptor {
  name: string;
  path: string;
}

export function resolvePluginDescriptors(
  aictxDir: string,
  config: AictxConfig
): PluginDescriptor[] {
  return config.plugins.map((entry) => {
    const path = isAbsolute(entry) ? entry : join(aictxDir, entry);
    return { name: basename(path, extname(path)), path };
  });
}

/**
 * Adapt a plugin module's exports into observers: every exported function
 * named after a hook (on the module or its default export) becomes one.
 */
export function observersFromModule(mod: unknown): Observer[] {
  if (!isRecord(mod)) return [];
  const sources = [mod];
  const fallback = mod["default"];
  if (isRecord(fallback)) sources.push(fallback);

  const observers: Observer[] = [];
  for (const source of sources) {
    for (const hook of HOOK_NAMES) {
      const fn = source[hook];
      if (typeof fn !== "function") continue;
      observers.push(
        onHook(hook, async (event) => {
          const result: unknown = fn.call(source, event);
          await result;
        })
      );
    }
  }
  return observers;
}

export async function loadPlugins(
  descriptors: readonly PluginDescriptor[],
  logger: Logger
): Promise<Observer[]> {
  const observers: Observer[] = [];
  for (const descriptor of descriptors) {
    try {
      const mod: unknown = await import(pathToFileURL(descriptor.path).href);
      const found = observersFromModule(mod);
      logger.debug(`plugin ${descriptor.name}: ${found.length} hook(s)`);
      observers.push(...found);
    } catch (err) {
      logger.warn(
        `plugin ${descriptor.name} could not be loaded: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
  return observers;
}
