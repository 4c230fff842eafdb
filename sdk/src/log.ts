import { pino, type Logger } from "pino";
import { loadLogLevel, type LogLevel } from "./config.js";

export type { Logger };

let root: Logger | undefined;

function rootLogger(): Logger {
  root ??= pino({ name: "training-ledger", level: loadLogLevel() });
  return root;
}

/**
 * Logger for one module of the library, e.g. createLogger("registry").
 * Every line carries the module name. The level defaults to LOG_LEVEL.
 */
export function createLogger(module: string, level?: LogLevel): Logger {
  return level ? rootLogger().child({ module }, { level }) : rootLogger().child({ module });
}
