import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTickContext } from './tick-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Enable pretty printing (development) */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

const LOG_PREFIX = 'pifand-';

/**
 * Generate timestamp-based log filename.
 */
function generateLogFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${LOG_PREFIX}${timestamp}.log`;
}

/**
 * Cleanup old log files, keeping only the most recent maxFiles.
 * Also removes empty log files.
 */
export function cleanupOldLogs(logDir: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime) // newest first
      .slice(maxFiles),
  ];

  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
    }
  }
}

/**
 * Create Pino mixin that injects the current tick into every entry.
 * Explicit fields in log args take precedence over the context values.
 */
function createTickMixin(): () => Record<string, unknown> {
  return () => {
    const ctx = getTickContext();
    if (!ctx) return {};
    return { tickId: ctx.tickId, tick: ctx.tickNumber };
  };
}

/**
 * Create a configured logger instance.
 *
 * Features:
 * - Console output with pino-pretty (in development)
 * - File output with timestamp-based filename
 * - Auto-cleanup of old and empty log files
 * - Auto-injection of tick context via mixin (AsyncLocalStorage)
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  fs.mkdirSync(logDir, { recursive: true });
  cleanupOldLogs(logDir, maxFiles);

  const logFilePath = path.join(logDir, generateLogFilename());

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: { colorize: true },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: 1 }, // stdout
    });
  }

  targets.push({
    target: 'pino-pretty',
    level,
    options: {
      destination: logFilePath,
      mkdir: true,
      colorize: false,
    },
  });

  return pino({
    level,
    transport: { targets },
    mixin: createTickMixin(),
  });
}

/**
 * Plain stderr logger for the observer clients, which keep no log files.
 */
export function createConsoleLogger(level: pino.Level = 'warn'): pino.Logger {
  return pino({ level }, pino.destination(2));
}
