import type { TeamLogger } from "./types.js";

export class ConsoleLogger implements TeamLogger {
  private prefix: string;

  constructor(component: string) {
    // Sanitize component name to prevent log injection via newlines/control chars
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safe = component.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
    this.prefix = `[${safe}]`;
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (process.env.TEAMWIRE_DEBUG !== "1") return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

/** Structured error logging; omits stack traces in production. */
export function logError(logger: TeamLogger, label: string, err: unknown, data?: Record<string, unknown>): void {
  if (process.env.NODE_ENV === "production" || !(err instanceof Error)) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.error(`${label}: ${msg}`, data);
  } else {
    logger.error(`${label}: ${err.message}`, { ...data, stack: err.stack });
  }
}
