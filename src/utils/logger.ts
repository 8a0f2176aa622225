import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from '../config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  id: string;
  timestamp: Date;
  level: LogLevel;
  message: string;
  data?: unknown;
}

type LogListener = (logs: LogEntry[]) => void;

interface LoggerOptions {
  level: LogLevel;
  /** Path of the append-only log file; empty disables it. */
  file: string;
  maxLogs?: number;
}

export class Logger {
  private logs: LogEntry[] = [];
  private listeners: Set<LogListener> = new Set();
  private readonly maxLogs: number;
  private readonly level: LogLevel;
  private readonly logFile: string | null;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.maxLogs = options.maxLogs ?? 1000;
    this.logFile = options.file ? path.resolve(process.cwd(), options.file) : null;
  }

  private emit() {
    this.listeners.forEach(listener => listener([...this.logs]));
  }

  private addLog(level: LogLevel, message: string, data?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      id: Math.random().toString(36).substring(2, 9),
      timestamp: new Date(),
      level,
      message,
      data,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    if (this.logFile) {
      const line = `[${entry.timestamp.toISOString()}] [${level.toUpperCase()}] ${message}${data === undefined ? '' : ` ${JSON.stringify(data)}`}\n`;
      try {
        fs.appendFileSync(this.logFile, line);
      } catch (e) {
        // The log file is best-effort; keep the entry in memory and report once on stderr.
        process.stderr.write(`[logger] cannot write ${this.logFile}: ${e instanceof Error ? e.message : String(e)}\n`);
      }
    }

    this.emit();
  }

  debug(message: string, data?: unknown) {
    this.addLog('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.addLog('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.addLog('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.addLog('error', message, data);
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    listener([...this.logs]);

    return () => {
      this.listeners.delete(listener);
    };
  }

  getHistory(): LogEntry[] {
    return [...this.logs];
  }
}

const appConfig = loadConfig();

export const logger = new Logger({ level: appConfig.logLevel, file: appConfig.logFile });

export function logDebug(msg: string, ...args: unknown[]) {
  if (args.length > 0) {
    logger.debug(msg, args);
  } else {
    logger.debug(msg);
  }
}
