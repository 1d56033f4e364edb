/**
 * Logger
 *
 * One instance per service. Console output is always on (subject to LOG_LEVEL);
 * a JSONL copy is appended to LOG_FILE_PATH when it is set.
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveThreshold(raw: string | undefined): number {
  const normalized = (raw || 'info').trim().toLowerCase();
  return isLevelName(normalized) ? LEVEL_ORDER[normalized] : LEVEL_ORDER.info;
}

export class Log {
  private static instances = new Map<string, Log>();
  private static fileReady = false;

  private service: string;
  private entries: LogEntry[] = [];

  private constructor(service: string) {
    this.service = service;
  }

  static create(config: { service: string }): Log {
    const { service } = config;
    let instance = Log.instances.get(service);
    if (!instance) {
      instance = new Log(service);
      Log.instances.set(service, instance);
    }
    return instance;
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      data,
    };
    this.entries.push(entry);

    if (LEVEL_ORDER[level] < resolveThreshold(process.env.LOG_LEVEL)) {
      return;
    }

    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${this.service}] [${level.toUpperCase()}]`;
    const output = `${prefix} ${message}`;

    if (level === 'error') {
      console.error(output, data ?? '');
    } else if (level === 'warn') {
      console.warn(output, data ?? '');
    } else {
      console.log(output, data ?? '');
    }

    this.writeToFile(entry);
  }

  private writeToFile(entry: LogEntry): void {
    const logFilePath = process.env.LOG_FILE_PATH;
    if (!logFilePath) {
      return;
    }
    try {
      if (!Log.fileReady) {
        fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
        Log.fileReady = true;
      }
      const payload = JSON.stringify({
        ...entry,
        service: this.service,
      });
      fs.appendFileSync(logFilePath, `${payload}\n`, { encoding: 'utf8' });
    } catch (error) {
      // Keep logger non-fatal.
      console.warn('[Log] Failed to persist log entry:', error);
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear() {
    this.entries = [];
  }
}

export function createLogger(service: string): Log {
  return Log.create({ service });
}
