// src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared pino logger for the library with contextual bind().
 * - Level comes from DtoEnv (DTO_LOG_LEVEL); setLogLevel() changes it at runtime.
 *
 * Notes:
 * - The root logger is created on first use so configuration overrides made
 *   before that point are honored.
 * - Child loggers created by bindLogger() follow later level changes of the root.
 *   They are held weakly; collected ones are pruned on the next level change.
 * - setDtoEnv({ logLevel }) after the root exists applies the level too.
 */

import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";
import {
  getDtoEnv,
  LOG_LEVELS,
  onDtoEnvChange,
  type DtoLogLevel,
} from "../env/DtoEnv";

export type DtoLogger = Logger;

let ROOT: Logger | null = null;

function pinoOptions(level: DtoLogLevel): LoggerOptions {
  return {
    name: "attribute-dto",
    level,
    base: {},
    timestamp: stdTimeFunctions.isoTime,
  };
}

export function rootLogger(): Logger {
  if (!ROOT) ROOT = pino(pinoOptions(getDtoEnv().logLevel));
  return ROOT;
}

const CHILDREN = new Set<WeakRef<Logger>>();

/** Logger with `ctx` bound onto every line. */
export function bindLogger(ctx: Record<string, unknown>): DtoLogger {
  const child = rootLogger().child(ctx);
  CHILDREN.add(new WeakRef(child));
  return child;
}

/** Bound loggers currently tracked for level changes. */
export function boundLoggerCount(): number {
  return CHILDREN.size;
}

export function isLogLevel(level: string): level is DtoLogLevel {
  return LOG_LEVELS.some((l) => l === level);
}

export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) throw new Error(`Invalid LOG_LEVEL: "${level}"`);
  rootLogger().level = level;
  for (const ref of CHILDREN) {
    const child = ref.deref();
    if (child) child.level = level;
    else CHILDREN.delete(ref);
  }
}

onDtoEnvChange((env) => {
  if (ROOT && ROOT.level !== env.logLevel) setLogLevel(env.logLevel);
});

export function getLogLevel(): string {
  return rootLogger().level;
}

export function serializeError(err: unknown): {
  name?: string;
  message: string;
  stack?: string;
} {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}
