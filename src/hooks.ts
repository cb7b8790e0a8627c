// Lifecycle hooks. Observers are passed explicitly to the command entry
// points; they only observe, and a failing observer never changes the outcome.

import type { AictxConfig } from "./config.js";
import { silentLogger, type Logger } from "./logger.js";
import type { DocumentIndex, Manifest } from "./model.js";

export const HOOK_NAMES = [
  "before_validate",
  "after_validate",
  "before_build_manifest",
  "after_build_manifest",
  "before_export",
  "after_export",
] as const;

export type HookName = (typeof HOOK_NAMES)[number];

interface HookBase {
  root: string;
  config: AictxConfig;
}

export type HookEvent =
  | (HookBase & { hook: "before_validate" })
  | (HookBase & { hook: "after_validate"; index: DocumentIndex; ok: boolean })
  | (HookBase & { hook: "before_build_manifest"; index: DocumentIndex })
  | (HookBase & { hook: "after_build_manifest"; manifest: Manifest })
  | (HookBase & { hook: "before_export"; index: DocumentIndex; adapter: string })
  | (HookBase & { hook: "after_export"; adapter: string });

export type HookEventOf<H extends HookName> = Extract<HookEvent, { hook: H }>;

export type Observer = (event: HookEvent) => void | Promise<void>;

export function isHook<H extends HookName>(
  event: HookEvent,
  hook: H
): event is HookEventOf<H> {
  return event.hook === hook;
}

/** Observer that only fires for one hook. */
export function onHook<H extends HookName>(
  hook: H,
  fn: (event: HookEventOf<H>) => void | Promise<void>
): Observer {
  return async (event) => {
    if (isHook(event, hook)) await fn(event);
  };
}

/**
 * Invoke every observer in order. Failures (thrown or rejected) are logged at
 * debug level and otherwise ignored.
 */
export async function emitHook(
  observers: readonly Observer[],
  event: HookEvent,
  logger: Logger = silentLogger
): Promise<void> {
  for (const observer of observers) {
    try {
      await observer(event);
    } catch (err) {
      logger.debug(
        `hook ${event.hook} failed: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
}
