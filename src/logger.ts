import winston from "winston";
import { LogService, isLoggingSilent, resolveLogLevel } from "./config";

const consoleFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let line = `${timestamp} [${level}]${service ? ` [${service}]` : ""} ${message}`;
    if (Object.keys(metadata).length > 0) {
      line += ` ${JSON.stringify(metadata)}`;
    }
    return line;
  })
);

const loggers = new Map<LogService, winston.Logger>();

/**
 * Logger for one interpreter. Loggers are created once per service.
 */
export function getLogger(service: LogService): winston.Logger {
  const existing = loggers.get(service);
  if (existing) return existing;

  const level = resolveLogLevel(service);
  const logger = winston.createLogger({
    level,
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        level,
        silent: isLoggingSilent(),
        stderrLevels: ["error", "warn", "info", "debug", "verbose", "silly"],
      }),
    ],
  });
  loggers.set(service, logger);
  return logger;
}
