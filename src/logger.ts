export type LogMethod = (message: string, ...details: unknown[]) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export type LogLevel = keyof Logger;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Console-backed logger with a `[memory-engine:<scope>]` prefix.
 * Everything goes to stderr: when the engine runs behind the stdio MCP
 * transport, stdout belongs to the protocol.
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const prefix = `[memory-engine:${scope}]`;
  const threshold = LEVEL_ORDER[level];
  const method =
    (lvl: LogLevel): LogMethod =>
    (message, ...details) => {
      if (LEVEL_ORDER[lvl] < threshold) return;
      console.error(`${prefix} ${lvl.toUpperCase()} ${message}`, ...details);
    };

  return { debug: method("debug"), info: method("info"), warn: method("warn"), error: method("error") };
}

const noop: LogMethod = () => {};

export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };
