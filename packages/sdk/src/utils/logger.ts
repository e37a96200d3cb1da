import { ENV_VAR_LOG } from "./constants.js";

const PREFIX = "[Docuflow]";

/**
 * Console logger used across the SDK. Debug and warning output is silent
 * unless debug logging is enabled; errors are only logged in debug mode too.
 */
export interface Logger {
  readonly enabled: boolean;
  debug(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
}

/**
 * Whether the environment asks for debug logging
 */
export function isLoggingEnabledByEnv(
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  const value = env[ENV_VAR_LOG]?.trim().toLowerCase();
  return value === "1" || value === "true" || value === "debug";
}

export function createLogger(enabled: boolean): Logger {
  return {
    enabled,
    debug(message, details) {
      if (!enabled) return;
      if (details) {
        console.log(`${PREFIX} ${message}`, details);
      } else {
        console.log(`${PREFIX} ${message}`);
      }
    },
    warn(message, details) {
      if (!enabled) return;
      if (details) {
        console.warn(`${PREFIX} ${message}`, details);
      } else {
        console.warn(`${PREFIX} ${message}`);
      }
    },
    error(message, error) {
      if (!enabled) return;
      console.error(`${PREFIX} ${message}`, error);
    },
  };
}
