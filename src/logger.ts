import path from 'path';
import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some(level => level === value);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local-time `YYYYMMDD_HHMMSS`, used to name log and report files. */
export function formatFileStamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface RunLogger {
  logger: Logger;
  logFile: string;
}

/**
 * Full detail goes to a timestamped JSON-lines file; warnings and errors are
 * mirrored to stderr so they show up next to the phase summaries.
 */
export function createRunLogger(logsDir: string, level: LevelWithSilent, now: Date = new Date()): RunLogger {
  const logFile = path.join(logsDir, `migration_${formatFileStamp(now)}.log`);
  const fileStream = pino.destination({ dest: logFile, mkdir: true, sync: true });

  const logger = pino(
    {
      name: 'image-migrator',
      level,
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.multistream([
      { level: 'trace', stream: fileStream },
      { level: 'warn', stream: process.stderr }
    ])
  );

  return { logger, logFile };
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
