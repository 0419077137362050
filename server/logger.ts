/**
 * Structured logging built on winston.
 *
 * Every module logs through a child of one root logger tagged with its
 * module name. Development output is a colorized single line; production
 * (or LOG_FORMAT=json) emits one JSON object per entry.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, json } = winston.format;

export interface LoggerSettings {
  level: string;
  json: boolean;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  return {
    level: env.LOG_LEVEL || "info",
    json: env.NODE_ENV === "production" || env.LOG_FORMAT === "json",
  };
}

/**
 * Console line format: `HH:mm:ss level [module] message {meta}` or JSON.
 */
export function consoleFormat(useJson: boolean): winston.Logform.Format {
  if (useJson) {
    return combine(timestamp(), json());
  }
  return combine(
    colorize(),
    timestamp({ format: "HH:mm:ss" }),
    printf(({ level, message, timestamp, module, ...meta }) => {
      const moduleTag = module ? `[${module}]` : "[server]";
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
      return `${timestamp} ${level} ${moduleTag} ${message}${metaStr}`;
    })
  );
}

export function buildLogger(
  settings: LoggerSettings,
  transports: winston.LoggerOptions["transports"] = new winston.transports.Console()
): winston.Logger {
  return winston.createLogger({
    level: settings.level,
    format: consoleFormat(settings.json),
    transports,
  });
}

export const logger = buildLogger(settingsFromEnv());

/**
 * Child logger whose entries carry `module: moduleName`.
 *
 * @example
 * const log = createLogger("text-layer");
 * log.info("Text layer detected", { pagesWithText: 3 });
 */
export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

/**
 * Log an HTTP request with structured metadata.
 * Only the supplied metadata is attached; response bodies are not logged.
 */
export function logRequest(
  method: string,
  path: string,
  status: number,
  duration: number,
  meta?: Record<string, unknown>
): void {
  logger.info(`${method} ${path} ${status} in ${duration}ms`, {
    method,
    path,
    status,
    duration,
    ...meta,
  });
}

/**
 * Log a failure at error level with its message and, for Error values, its stack.
 */
export function logFailure(
  log: winston.Logger,
  message: string,
  error: unknown,
  meta?: Record<string, unknown>
): void {
  if (error instanceof Error) {
    log.error(message, { ...meta, error: error.message, stack: error.stack });
    return;
  }
  log.error(message, { ...meta, error: String(error) });
}

export default logger;
