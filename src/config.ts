/**
 * Logging configuration.
 */

export type LogService = "dry" | "direct" | "codegen";

export interface LoggingConfig {
  defaultLevel: string;
  services: Record<LogService, { level: string }>;
}

export const loggingConfig: LoggingConfig = {
  defaultLevel: "warn",
  services: {
    dry: { level: "warn" },
    direct: { level: "warn" },
    codegen: { level: "warn" },
  },
};

/**
 * Level for a service. LOG_LEVEL wins over everything, then
 * IMPERATIVE_DEBUG=true, then the service default.
 */
export function resolveLogLevel(service: LogService, env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  if (env.IMPERATIVE_DEBUG === "true") {
    return "debug";
  }
  return loggingConfig.services[service].level;
}

/** Console output is muted while tests run */
export function isLoggingSilent(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV === "test" && !env.LOG_LEVEL;
}
