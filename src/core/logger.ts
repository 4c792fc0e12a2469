import pino, { type TransportTargetOptions } from "pino";
import { env } from "./config";

function buildTargets(): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [];

  if (env.LOG_PRETTY) {
    targets.push({
      target: "pino-pretty",
      level: env.LOG_LEVEL,
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    });
  } else {
    targets.push({ target: "pino/file", level: env.LOG_LEVEL, options: { destination: 1 } });
  }

  if (env.LOG_FILE) {
    targets.push({
      target: "pino/file",
      level: env.LOG_LEVEL,
      options: { destination: env.LOG_FILE, mkdir: true },
    });
  }

  return targets;
}

export const logger =
  env.LOG_LEVEL === "silent"
    ? pino({ level: "silent" })
    : pino({ level: env.LOG_LEVEL }, pino.transport({ targets: buildTargets() }));

export type Logger = typeof logger;

export type LifecycleLevel = "debug" | "info" | "warn" | "error";

/**
 * Sink for pipeline lifecycle events. Components report what happened and
 * leave formatting to the implementation.
 */
export interface LifecycleLog {
  log(level: LifecycleLevel, message: string, fields?: Record<string, unknown>): void;
}

export function createLifecycleLog(bindings: Record<string, unknown> = {}, base: Logger = logger): LifecycleLog {
  const child = base.child(bindings);
  return {
    log(level, message, fields = {}) {
      child[level](fields, message);
    },
  };
}
