import { getConfig, type LogLevel } from './config';

export interface LogEntry {
  level: LogLevel;
  /** Component tag, e.g. `ArxivClient` or `ContentAnalysis` */
  component: string;
  message: string;
  sessionId?: string;
  durationMs?: number;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function formatEntry(entry: LogEntry): string {
  const parts = [`[${new Date().toISOString()}]`, `[${entry.level.toUpperCase()}]`];

  if (entry.sessionId) {
    parts.push(`[session:${entry.sessionId.slice(0, 8)}]`);
  }

  parts.push(`[${entry.component}]`, entry.message);

  if (entry.durationMs !== undefined) {
    parts.push(`(${entry.durationMs}ms)`);
  }

  return parts.join(' ');
}

export function log(entry: LogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[getConfig().logging.level]) {
    return;
  }

  const formatted = formatEntry(entry);
  switch (entry.level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
