import { pino, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level: string;
  /** Human-readable colorized output (development) instead of JSON lines */
  pretty: boolean;
}

/**
 * Build the root logger shared by the watch loop and the HTTP server.
 * Components take `logger.child({ component })` from it.
 */
export function createLogger(options: LoggerOptions): Logger {
  if (options.pretty) {
    return pino({
      level: options.level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    });
  }
  return pino({ level: options.level });
}
