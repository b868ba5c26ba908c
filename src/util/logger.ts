import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && Object.hasOwn(LEVEL_ORDER, v);
}

/** Level from EDAPARSE_LOG_LEVEL, falling back to info. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.EDAPARSE_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

/**
 * Namespaced console logger.
 *
 * ```ts
 * const log = createLogger("spice");
 * log.info("parsed 12 statements");
 * // → [edaparse:spice] parsed 12 statements
 * ```
 */
export function createLogger(namespace: string, level: LogLevel = resolveLogLevel()): Logger {
  const prefix = `[edaparse:${namespace}]`;
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];

  return {
    debug: (m) => {
      if (enabled("debug")) console.debug(chalk.gray(`${prefix} ${m}`));
    },
    info: (m) => {
      if (enabled("info")) console.log(`${chalk.cyan(prefix)} ${m}`);
    },
    warn: (m) => {
      if (enabled("warn")) console.warn(chalk.yellow(`${prefix} ${m}`));
    },
    error: (m) => {
      if (enabled("error")) console.error(chalk.red(`${prefix} ${m}`));
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
