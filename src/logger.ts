import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerFactoryOptions {
  level?: string;
  name?: string;
}

let rootLogger: Logger | null = null;

// Structured JSON logger with explicit timestamp field 'ts' (epoch ms).
export function createLogger(options: LoggerFactoryOptions = {}): Logger {
  return pino({
    level: options.level ?? process.env.LOG_LEVEL ?? "info",
    name: options.name ?? "compose-ready",
    base: { pid: undefined },
    timestamp: () => `,"ts":${Date.now()}`
  });
}

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

export function createChildLogger(bindings: Record<string, unknown>, level?: string): Logger {
  return getLogger().child(bindings, level ? { level } : undefined);
}
