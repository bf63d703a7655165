/**
 * @fileoverview Logger capability handed to the partitioner and the
 * validation run. Backed by winston; the CLI owns the instance.
 */

import winston from "winston";
import type TransportStream from "winston-transport";

export const LogLevels = {
  CHECKLIST: "checklist" as const,
  ERROR: "error" as const,
  WARN: "warn" as const,
  INFO: "info" as const,
  DEBUG: "debug" as const,
};

export type LevelName = (typeof LogLevels)[keyof typeof LogLevels];

export interface Logger {
  error: (message: string, ...meta: unknown[]) => void;
  warn: (message: string, ...meta: unknown[]) => void;
  info: (message: string, ...meta: unknown[]) => void;
  debug: (message: string, ...meta: unknown[]) => void;
  /** Progress lines, printed without timestamp or level */
  checklist: (message: string) => void;
}

// checklist ranks first so progress lines show at every level
const levels: Record<LevelName, number> = {
  checklist: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const lineFormat = winston.format.printf((info) => {
  if (info.level === LogLevels.CHECKLIST) {
    return String(info.message);
  }
  const { timestamp, level, message, ...meta } = info;
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}${extra}`;
});

export interface LoggerOptions {
  /** Most verbose level that is written (default "error") */
  level?: LevelName;
  /** Replaces the default stderr console transport */
  transports?: TransportStream[];
  silent?: boolean;
}

/**
 * Creates a logger. Console output goes to stderr so that stdout stays
 * free for JSON results.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const winstonLogger = winston.createLogger({
    level: options.level ?? LogLevels.ERROR,
    levels,
    silent: options.silent ?? false,
    format: winston.format.combine(winston.format.timestamp(), lineFormat),
    transports: options.transports ?? [
      new winston.transports.Console({
        stderrLevels: Object.values(LogLevels),
      }),
    ],
  });

  return {
    error: (message, ...meta) => winstonLogger.error(message, ...meta),
    warn: (message, ...meta) => winstonLogger.warn(message, ...meta),
    info: (message, ...meta) => winstonLogger.info(message, ...meta),
    debug: (message, ...meta) => winstonLogger.debug(message, ...meta),
    checklist: (message) => winstonLogger.log(LogLevels.CHECKLIST, message),
  };
}

/** Default for library callers that do not pass a logger */
export const silentLogger: Logger = createLogger({ silent: true });
