/**
 * Logging infrastructure for the sitemap registry
 *
 * Structured log lines are written to a rotating file under the data
 * directory rather than to the console.
 */

import fs from 'fs';
import path from 'path';
import { config } from './config.js';

/**
 * Log level enumeration
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  /** Base directory for log files */
  logDir: string;

  /** Minimum log level to record */
  minLevel: LogLevel;

  /** File name for the log file */
  logFile: string;

  /** Maximum log file size before rotation (in bytes) */
  maxFileSize: number;

  /** Maximum number of log files to keep */
  maxFiles: number;

  /** When false, nothing is written and no file is opened */
  enabled: boolean;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

function levelFromName(name: string): LogLevel {
  return LEVEL_ORDER.find(level => level === name.toUpperCase()) ?? LogLevel.INFO;
}

/**
 * Class for structured logging
 */
export class Logger {
  private static instance: Logger | undefined;
  private config: LoggerConfig;
  private writeStream: fs.WriteStream | null = null;
  private pendingCloses: Promise<void>[] = [];
  private currentLogSize = 0;
  private logFilePath: string;

  private constructor(config: LoggerConfig) {
    this.config = config;
    this.logFilePath = path.join(config.logDir, config.logFile);
  }

  /**
   * Get the singleton logger instance
   */
  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger({
        logDir: path.join(config.dataDir, 'logs'),
        minLevel: levelFromName(config.logLevel),
        logFile: 'sitemap.log',
        maxFileSize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        enabled: config.logEnabled
      });
    }

    return Logger.instance;
  }

  /**
   * Configure the logger. The current file, if open, is closed and the next
   * line written opens the file named by the new configuration.
   */
  public static configure(update: Partial<LoggerConfig>): void {
    const logger = Logger.getInstance();
    logger.close();
    logger.config = { ...logger.config, ...update };
    logger.logFilePath = path.join(logger.config.logDir, logger.config.logFile);
  }

  /**
   * Close the underlying file stream, if any
   */
  public close(): void {
    const stream = this.writeStream;
    if (stream) {
      this.writeStream = null;
      this.pendingCloses.push(
        new Promise(resolve => {
          // Also called with the error when the stream failed
          stream.end(() => resolve());
        })
      );
    }
  }

  /**
   * Close the file stream and wait until every pending line is written,
   * including lines written to files rotated away since the last flush
   */
  public async flush(): Promise<void> {
    this.close();
    const pending = this.pendingCloses;
    this.pendingCloses = [];
    await Promise.all(pending);
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return this.config.enabled && LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.config.minLevel);
  }

  private openStream(): fs.WriteStream {
    if (this.writeStream) {
      return this.writeStream;
    }

    fs.mkdirSync(this.config.logDir, { recursive: true });
    this.currentLogSize = fs.existsSync(this.logFilePath) ? fs.statSync(this.logFilePath).size : 0;
    // Open synchronously so the file exists before a rotation can rename it
    const fd = fs.openSync(this.logFilePath, 'a');
    const stream = fs.createWriteStream(this.logFilePath, { fd });
    stream.on('error', error => {
      // Fallback to console; the next line written opens a new stream
      console.error('Failed to write log:', error);
      if (this.writeStream === stream) {
        this.writeStream = null;
      }
    });
    this.writeStream = stream;
    return stream;
  }

  /**
   * Rotate log file if it exceeds the maximum size
   */
  private rotateLogFile(): void {
    if (this.currentLogSize < this.config.maxFileSize) {
      return;
    }

    this.close();

    for (let i = this.config.maxFiles - 1; i > 0; i--) {
      const oldPath = path.join(this.config.logDir, `${this.config.logFile}.${i}`);
      const newPath = path.join(this.config.logDir, `${this.config.logFile}.${i + 1}`);
      if (fs.existsSync(oldPath)) {
        fs.renameSync(oldPath, newPath);
      }
    }

    fs.renameSync(this.logFilePath, path.join(this.config.logDir, `${this.config.logFile}.1`));
    this.currentLogSize = 0;
  }

  /**
   * Format a log line
   * @param context Log context (e.g., class or module name)
   */
  static formatEntry(level: LogLevel, message: string, context: string, metadata?: unknown, timestamp = new Date()): string {
    let logEntry = `${timestamp.toISOString()} [${level}] [${context}] ${message}`;

    if (metadata !== undefined && metadata !== null) {
      if (metadata instanceof Error) {
        logEntry += ` ${JSON.stringify({ name: metadata.name, message: metadata.message })}`;
      } else if (typeof metadata === 'object') {
        logEntry += ` ${JSON.stringify(metadata)}`;
      } else {
        logEntry += ` ${String(metadata)}`;
      }
    }

    return `${logEntry}\n`;
  }

  private writeLog(level: LogLevel, message: string, context: string, metadata?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const logEntry = Logger.formatEntry(level, message, context, metadata);

    try {
      this.openStream();
      this.rotateLogFile();
      this.openStream().write(logEntry);
      this.currentLogSize += Buffer.byteLength(logEntry);
    } catch (error) {
      // Fallback to console in case of write failure
      console.error('Failed to write log:', error);
    }
  }

  public error(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, context, metadata);
  }

  public warn(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.WARN, message, context, metadata);
  }

  public info(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.INFO, message, context, metadata);
  }

  public debug(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, context, metadata);
  }

  /**
   * Log an error with stack trace
   * @param message Optional message to use instead of the error's own
   */
  public logError(error: Error, context: string, message?: string): void {
    const logMessage = message || error.message;
    this.error(logMessage, context, {
      stack: error.stack,
      name: error.name,
      message: error.message
    });
  }
}

// Convenience function to get the logger instance
export function getLogger(): Logger {
  return Logger.getInstance();
}
