import { pino } from 'pino';
import type { LogLevel } from './types.js';

export interface LoggerOptions {
  level?: LogLevel;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  /** Append JSON lines to this file instead of writing to stderr */
  file?: string;
}

export function createLogger(name: string = 'cliff-knapsack', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? 'info';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  if (options.file) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino/file',
        options: { destination: options.file, mkdir: true },
      },
    });
  }

  // stdout carries the generation report
  return pino({ name, level }, pino.destination(2));
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
