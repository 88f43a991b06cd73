import fs from 'fs/promises';
import path from 'path';
import os from 'os';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface ILogger {
  info(category: string, message: string, metadata?: Record<string, unknown>): Promise<void>;
  debug(category: string, message: string, metadata?: Record<string, unknown>): Promise<void>;
  warn(category: string, message: string, metadata?: Record<string, unknown>): Promise<void>;
  error(category: string, message: string, metadata?: Record<string, unknown>): Promise<void>;
  isActive(): boolean;
  getArchivedLogs(): LogEntry[];
}

const MAX_ARCHIVED_LOGS = 200;
const LEVELS: LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

/**
 * Reads the DEBUG variable. A level name turns logging on at that level,
 * anything else (including unset and FALSE) leaves it off.
 */
export function parseLogLevel(value: string | undefined): LogLevel | false {
  const upper = value?.trim().toUpperCase();
  return LEVELS.find(level => level === upper) ?? false;
}

export class Logger implements ILogger {
  private static instance: Logger | undefined;
  private readonly logDir: string;
  private readonly currentLogFile: string;
  private readonly logBuffer: LogEntry[] = [];
  private flushInterval: NodeJS.Timeout | null = null;
  private readonly logLevel: LogLevel | false;
  private isShuttingDown = false;
  private readonly recentLogsArchive: LogEntry[] = [];

  private shouldLog(level: LogLevel): boolean {
    if (this.logLevel === false) return false;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private constructor(logLevel: LogLevel | false, logDir: string) {
    this.logLevel = logLevel;

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logDir = logDir;
    this.currentLogFile = path.join(this.logDir, `mcp-chat-${timestamp}.log`);

    if (this.isActive()) {
      this.flushInterval = setInterval(() => {
        void this.flushBuffer();
      }, 5000);
      this.flushInterval.unref();
      this.setupShutdownHandlers();
    }
  }

  static async init(
    logLevel: LogLevel | false = parseLogLevel(process.env.DEBUG),
    logDir: string = path.join(os.homedir(), '.mcp-chat', 'logs')
  ): Promise<Logger> {
    if (!Logger.instance) {
      Logger.instance = new Logger(logLevel, logDir);
      if (Logger.instance.isActive()) {
        await Logger.instance.initializeLogDir();
      }
    }
    return Logger.instance;
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      throw new Error('Logger not initialized. Call Logger.init() first');
    }
    return Logger.instance;
  }

  public isActive(): boolean {
    return this.logLevel !== false;
  }

  private async initializeLogDir() {
    try {
      await fs.mkdir(this.logDir, { recursive: true });
    } catch (error) {
      console.error('Failed to create log directory:', error);
    }
  }

  private setupShutdownHandlers() {
    process.on('beforeExit', () => {
      void this.shutdown();
    });
    process.on('SIGTERM', () => {
      void this.shutdown();
    });
  }

  /** Stops the flush timer and writes out whatever is still buffered. */
  public async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    await this.flushBuffer();
  }

  private async flushBuffer() {
    if (this.logBuffer.length === 0 || !this.isActive()) return;

    const entries = this.logBuffer.splice(0);
    const logContent = entries
      .map(entry => JSON.stringify(entry))
      .join('\n') + '\n';

    try {
      await fs.appendFile(this.currentLogFile, logContent, 'utf8');
    } catch (error) {
      console.error('Failed to write to log file:', error);
      this.logBuffer.unshift(...entries);
    }
  }

  private async log(level: LogLevel, category: string, message: string, metadata?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      metadata
    };

    this.logBuffer.push(entry);

    this.recentLogsArchive.push(entry);
    if (this.recentLogsArchive.length > MAX_ARCHIVED_LOGS) {
      this.recentLogsArchive.shift();
    }

    if (level === 'ERROR' || this.logBuffer.length > 1000) {
      await this.flushBuffer();
    }
  }

  public getArchivedLogs(): LogEntry[] {
    return [...this.recentLogsArchive];
  }

  async debug(category: string, message: string, metadata?: Record<string, unknown>) {
    await this.log('DEBUG', category, message, metadata);
  }

  async info(category: string, message: string, metadata?: Record<string, unknown>) {
    await this.log('INFO', category, message, metadata);
  }

  async warn(category: string, message: string, metadata?: Record<string, unknown>) {
    await this.log('WARN', category, message, metadata);
  }

  async error(category: string, message: string, metadata?: Record<string, unknown>) {
    await this.log('ERROR', category, message, metadata);
  }
}
