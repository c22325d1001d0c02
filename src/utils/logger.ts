/**
 * Rainflow Engine - Logger
 * ========================
 * Leveled console/file logging shared by the engine, CLI and server
 */

import * as fs from 'fs';
import * as path from 'path';

// ============================================================================
// LOG LEVELS
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ============================================================================
// COLORS FOR TERMINAL
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.cyan,
  warn: COLORS.yellow,
  error: COLORS.red,
};

// ============================================================================
// LOGGER CLASS
// ============================================================================

export interface LoggerOptions {
  level?: LogLevel;
  console?: boolean;
  file?: boolean;
  filePath?: string;
  /** Prefix for every line, e.g. the component name */
  scope?: string;
}

export class Logger {
  private level: LogLevel;
  private readonly enableConsole: boolean;
  private readonly enableFile: boolean;
  private readonly filePath: string | null;
  private readonly scope: string | null;
  private fileStream: fs.WriteStream | null = null;

  constructor(options?: LoggerOptions, stream?: fs.WriteStream | null) {
    this.level = options?.level ?? 'info';
    this.enableConsole = options?.console ?? true;
    this.enableFile = options?.file ?? false;
    this.filePath = options?.filePath ?? null;
    this.scope = options?.scope ?? null;

    if (stream) {
      this.fileStream = stream;
    } else if (this.enableFile && this.filePath) {
      this.fileStream = openLogFile(this.filePath);
    }
  }

  /**
   * Logger writing to the same outputs with a component prefix
   */
  child(scope: string): Logger {
    return new Logger(
      {
        level: this.level,
        console: this.enableConsole,
        file: this.enableFile,
        filePath: this.filePath ?? undefined,
        scope: this.scope ? `${this.scope}:${scope}` : scope,
      },
      this.fileStream,
    );
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /** Payloads go on one line in the file, indented on the console */
  private formatData(data: unknown, indent: number): string {
    if (data instanceof Error) return data.stack ?? data.message;
    return typeof data === 'object' && data !== null ? JSON.stringify(data, null, indent) : String(data);
  }

  /**
   * Plain line for the log file
   */
  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : '';
    let formatted = `[${timestamp}] [${level.toUpperCase().padEnd(5)}]${scope} ${message}`;

    if (data !== undefined) {
      formatted += ` ${this.formatData(data, 0)}`;
    }

    return formatted;
  }

  /**
   * Colored line for the terminal
   */
  private formatConsoleMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const color = LEVEL_COLORS[level];
    const levelStr = level.toUpperCase().padEnd(5);
    const scope = this.scope ? ` ${COLORS.magenta}[${this.scope}]${COLORS.reset}` : '';

    let formatted = `${COLORS.dim}[${timestamp}]${COLORS.reset} ${color}[${levelStr}]${COLORS.reset}${scope} ${message}`;

    if (data !== undefined) {
      formatted += `\n${COLORS.dim}${this.formatData(data, 2)}${COLORS.reset}`;
    }

    return formatted;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;

    if (this.enableConsole) {
      const consoleMsg = this.formatConsoleMessage(level, message, data);
      if (level === 'error') {
        console.error(consoleMsg);
      } else if (level === 'warn') {
        console.warn(consoleMsg);
      } else {
        console.log(consoleMsg);
      }
    }

    if (this.fileStream) {
      this.fileStream.write(this.formatMessage(level, message, data) + '\n');
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Close file stream
   */
  close(): void {
    if (this.fileStream) {
      this.fileStream.end();
      this.fileStream = null;
    }
  }
}

function openLogFile(filePath: string): fs.WriteStream {
  const absolutePath = path.resolve(filePath);
  const dir = path.dirname(absolutePath);

  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  return fs.createWriteStream(absolutePath, { flags: 'a' });
}

// ============================================================================
// SINGLETON LOGGER
// ============================================================================

let globalLogger: Logger | null = null;

export function initLogger(options?: LoggerOptions): Logger {
  globalLogger?.close();
  globalLogger = new Logger(options);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
