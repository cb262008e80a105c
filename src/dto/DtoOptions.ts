// src/dto/DtoOptions.ts
/**
 * Purpose:
 * - Policy flags for a Dto instance and their resolution from the class's
 *   declared capabilities.
 *
 * Invariants:
 * - A class's capabilities are resolved once and cached (keyed by the class
 *   itself) unless DTO_OPTIONS_CACHE is off.
 * - Resolved flags are frozen; each instance works on its own copy.
 */

import { getDtoEnv } from "../env/DtoEnv";
import { bindLogger, type DtoLogger } from "../logger/Logger";

export type DtoOptionFlags = {
  /** Writing an attribute that is already present fails. */
  forbidsOverrides: boolean;
  /** Reading an absent attribute yields undefined instead of failing. */
  ignoresUnknown: boolean;
  /** Writes fail once the instance is initialized. */
  readOnly: boolean;
};

export type DtoCapability = keyof DtoOptionFlags;

export const DtoCapabilities = {
  ForbidsOverrides: "forbidsOverrides",
  IgnoresUnknown: "ignoresUnknown",
  ReadOnly: "readOnly",
} as const satisfies Record<string, DtoCapability>;

export const DTO_OPTION_KEYS: readonly DtoCapability[] = [
  "forbidsOverrides",
  "ignoresUnknown",
  "readOnly",
];

/** Static surface a class exposes for option resolution. */
export type DtoCapabilitySource = {
  readonly name: string;
  readonly capabilities: readonly DtoCapability[];
};

const RESOLVED = new WeakMap<DtoCapabilitySource, Readonly<DtoOptionFlags>>();

let LOG: DtoLogger | null = null;
function log(): DtoLogger {
  if (!LOG) LOG = bindLogger({ component: "DtoOptions" });
  return LOG;
}

export function isOptionKey(key: string): key is DtoCapability {
  return DTO_OPTION_KEYS.some((k) => k === key);
}

export function defaultDtoOptions(): DtoOptionFlags {
  return { forbidsOverrides: false, ignoresUnknown: false, readOnly: false };
}

export function resolveDtoOptions(
  source: DtoCapabilitySource
): Readonly<DtoOptionFlags> {
  const useCache = getDtoEnv().optionsCache;
  const hit = useCache ? RESOLVED.get(source) : undefined;
  if (hit) return hit;

  const declared = new Set(source.capabilities);
  const flags = Object.freeze({
    forbidsOverrides: declared.has("forbidsOverrides"),
    ignoresUnknown: declared.has("ignoresUnknown"),
    readOnly: declared.has("readOnly"),
  });

  if (useCache) {
    RESOLVED.set(source, flags);
    log().debug({ dto: source.name, ...flags }, "dto options resolved");
  }

  return flags;
}

export function isOptionsResolved(source: DtoCapabilitySource): boolean {
  return RESOLVED.has(source);
}

/**
 * Apply recognized keys of `patch` onto `target`, coercing each to boolean.
 * Returns the keys that were applied.
 */
export function mergeDtoOptions(
  target: DtoOptionFlags,
  patch: Readonly<Record<string, unknown>>
): DtoCapability[] {
  const applied: DtoCapability[] = [];
  for (const [key, value] of Object.entries(patch)) {
    if (!isOptionKey(key)) continue;
    target[key] = Boolean(value);
    applied.push(key);
  }
  return applied;
}
