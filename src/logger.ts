import * as winston from "winston";

const { combine, timestamp, errors, printf } = winston.format;

export type Logger = winston.Logger;

const LEVELS = ["error", "warn", "info", "debug"] as const;

const logFormat = printf((info) => {
  const { level, message, timestamp: ts, stack, ...meta } = info;
  const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  const stackString = typeof stack === "string" ? `\n${stack}` : "";
  return `${ts} [${level}] ${message}${metaString}${stackString}`;
});

/**
 * Diagnostics go to stderr at every level: stdout belongs to the status
 * bar and carries nothing but status lines.
 */
export function createLogger(
  level: string = process.env.LOG_LEVEL || "warn",
  options: { silent?: boolean } = {}
): Logger {
  return winston.createLogger({
    level,
    silent: options.silent,
    format: combine(
      timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      errors({ stack: true }),
      logFormat
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: [...LEVELS],
      }),
    ],
  });
}

export const logger = createLogger();
