import pino, { type Logger } from "pino";
import type { Env } from "./env";

let logger: Logger | null = null;

/**
 * Process-wide diagnostic logger. The first call opens the append-only log
 * file; later calls return the same instance and ignore their argument.
 */
export function getLogger(env: Pick<Env, "YAHTZEE_LOG_FILE" | "LOG_LEVEL">): Logger {
  if (logger) {
    return logger;
  }

  const destination = pino.destination({
    dest: env.YAHTZEE_LOG_FILE,
    append: true,
    mkdir: true,
    sync: true,
  });

  logger = pino(
    {
      level: env.LOG_LEVEL,
      base: { app: "yahtzee" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
  return logger;
}
