import { pino, destination } from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

/** JSON lines on stderr, leaving stdout to command output. Level: LOG_LEVEL, then config. */
export function createLogger(level?: string): Logger {
  return pino(
    {
      name: "push-triage",
      level: process.env.LOG_LEVEL ?? level ?? "info",
    },
    destination(2),
  );
}

export function createChildLogger(
  logger: Logger,
  context: { rev?: string; branch?: string; group?: string; [key: string]: unknown },
): Logger {
  return logger.child(context);
}

/** Logger that drops everything; the default when a caller injects none. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
