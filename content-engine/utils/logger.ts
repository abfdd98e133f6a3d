/**
 * Logger plumbing shared by every module.
 *
 * Components take a `Logger` callback in their constructor instead of
 * writing to the console themselves, so the CLI decides verbosity and tests
 * can pass `silentLogger`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const silentLogger: Logger = () => {};

/**
 * Console-backed logger filtered by minimum level.
 * Output format: `[WARN] message {"key":"value"}`
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[minLevel];

  return (level, message, data) => {
    if (LEVEL_ORDER[level] < threshold) return;

    const line = formatLogLine(level, message, data);
    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  };
}

export function formatLogLine(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const prefix = `[${level.toUpperCase()}] ${message}`;
  if (!data || Object.keys(data).length === 0) {
    return prefix;
  }
  return `${prefix} ${JSON.stringify(data)}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
