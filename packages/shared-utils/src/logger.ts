import { nowIso } from './date.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toUpperCase();
  if (!normalized) return 'INFO';
  if (normalized === 'DEBUG' || normalized === 'INFO' || normalized === 'WARN' || normalized === 'ERROR') {
    return normalized;
  }
  if (normalized === 'WARNING') return 'WARN';
  throw new Error(`LOG_LEVEL must be one of DEBUG|INFO|WARN|ERROR, got: ${raw}`);
}

/**
 * Error 인스턴스는 JSON.stringify 시 빈 객체가 되므로 필드를 풀어서 기록
 */
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }
  if (data && typeof data === 'object' && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return out;
  }
  return data;
}

/**
 * 레벨을 지정하지 않으면 기록할 때마다 LOG_LEVEL을 읽는다.
 * 모듈 로드 시점에 만든 로거도 이후 loadWorkspaceEnv()로 읽은 값을 따른다.
 */
export class Logger {
  constructor(
    private serviceName: string,
    private minLevel?: LogLevel,
  ) {}

  private get level(): LogLevel {
    return this.minLevel ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data: data === undefined ? undefined : serializeData(data),
    };

    const formatted = JSON.stringify(entry);

    switch (level) {
      case 'DEBUG':
      case 'INFO':
        console.log(formatted);
        break;
      case 'WARN':
        console.warn(formatted);
        break;
      case 'ERROR':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    this.log('ERROR', message, error);
  }
}

export function createLogger(serviceName: string, level?: LogLevel): Logger {
  return new Logger(serviceName, level);
}
