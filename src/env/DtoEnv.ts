// src/env/DtoEnv.ts
/**
 * Purpose:
 * - Runtime configuration for the library, read from the process environment
 *   (optionally merged over a dotenv file) and validated with zod.
 *
 * Keys:
 * - DTO_LOG_LEVEL      pino level; default "warn"
 * - DTO_OPTIONS_CACHE  boolean-like; default true. When false, option
 *                      capabilities are re-resolved for every instance.
 *
 * Precedence:
 * - Values already present in the source env win over the env file.
 */

import fs from "node:fs";
import * as dotenv from "dotenv";
import { z } from "zod";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type DtoLogLevel = (typeof LOG_LEVELS)[number];

const TRUE_WORDS = ["1", "true", "on", "yes"];
const FALSE_WORDS = ["0", "false", "off", "no"];

const BoolLike = z
  .string()
  .trim()
  .toLowerCase()
  .refine((s) => TRUE_WORDS.includes(s) || FALSE_WORDS.includes(s), {
    message: "must be boolean-like (true/false/on/off/yes/no/1/0)",
  })
  .transform((s) => TRUE_WORDS.includes(s));

const DtoEnvSchema = z.object({
  DTO_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .default("warn"),
  DTO_OPTIONS_CACHE: BoolLike.default("true"),
});

export type DtoEnv = {
  logLevel: DtoLogLevel;
  optionsCache: boolean;
};

export class DtoEnvError extends Error {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super(
      `DTO_ENV_INVALID: ${issues
        .map((i) => `${i.path} ${i.message}`)
        .join("; ")}`
    );
    this.name = "DtoEnvError";
    this.issues = issues;
  }
}

function readEnvFile(file: string): Record<string, string> {
  // A named file that is missing is an operator error, not a default.
  return dotenv.parse(fs.readFileSync(file, "utf8"));
}

/**
 * Parse configuration from `source` (defaults to process.env).
 * Blank values are treated as absent so defaults apply.
 */
export function loadDtoEnv(options?: {
  source?: Record<string, string | undefined>;
  envFile?: string;
}): DtoEnv {
  const fromFile = options?.envFile ? readEnvFile(options.envFile) : {};
  const merged: Record<string, string> = { ...fromFile };

  for (const [k, v] of Object.entries(options?.source ?? process.env)) {
    if (v != null && v.trim() !== "") merged[k] = v;
  }

  const parsed = DtoEnvSchema.safeParse(merged);
  if (!parsed.success) {
    throw new DtoEnvError(
      parsed.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
      }))
    );
  }

  return {
    logLevel: parsed.data.DTO_LOG_LEVEL,
    optionsCache: parsed.data.DTO_OPTIONS_CACHE,
  };
}

let CURRENT: DtoEnv | null = null;

/** Lazily loaded, process-wide configuration. */
export function getDtoEnv(): DtoEnv {
  if (!CURRENT) CURRENT = loadDtoEnv();
  return CURRENT;
}

export type DtoEnvListener = (env: DtoEnv) => void;

const LISTENERS = new Set<DtoEnvListener>();

/** Called after every setDtoEnv(); returns an unsubscribe function. */
export function onDtoEnvChange(listener: DtoEnvListener): () => void {
  LISTENERS.add(listener);
  return () => {
    LISTENERS.delete(listener);
  };
}

export function setDtoEnv(patch: Partial<DtoEnv>): DtoEnv {
  const next = { ...getDtoEnv(), ...patch };
  CURRENT = next;
  for (const listener of LISTENERS) listener(next);
  return next;
}

export function resetDtoEnv(): void {
  CURRENT = null;
}
