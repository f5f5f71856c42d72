import type { Logger } from '../../src/logger.js';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  event: unknown;
  context: unknown;
}

export const createRecordingLogger = () => {
  const entries: LogEntry[] = [];
  const record =
    (level: LogEntry['level']) =>
    (event?: unknown, context?: unknown) => {
      entries.push({ level, event, context });
    };

  const logger: Logger = {
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };

  return {
    logger,
    entries,
    events: (level?: LogEntry['level']) =>
      entries.filter((entry) => !level || entry.level === level).map((entry) => entry.event),
  };
};

export const silentLogger: Logger = createRecordingLogger().logger;
