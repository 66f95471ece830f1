/**
 * @fileoverview Centralized Logging Utility
 *
 * Provides consistent logging for the circuit log with:
 * - Log levels (debug, info, warn, error) gated by a minimum level
 * - Bounded in-memory history for inspecting what happened in a session
 * - Structured data attached to every entry
 *
 * @module lib/logger
 */

import { getEcmoConfig } from './ecmo-config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Minimum level for console output; `silent` keeps history only. */
export type LogThreshold = LogLevel | 'silent';

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
  timestamp: string;
}

export interface LoggerOptions {
  minLevel?: LogThreshold;
  maxHistorySize?: number;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class Logger {
  private minLevel: LogThreshold;
  private logHistory: LogEntry[] = [];
  private maxHistorySize: number;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'warn';
    this.maxHistorySize = options.maxHistorySize ?? 100;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    };

    // Store in history regardless of the console threshold
    this.logHistory.push(entry);
    if (this.logHistory.length > this.maxHistorySize) {
      this.logHistory.shift();
    }

    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const logMessage = `[${level.toUpperCase()}] ${message}`;

    switch (level) {
      case 'debug':
        console.debug(logMessage, data ?? '');
        break;
      case 'info':
        console.log(logMessage, data ?? '');
        break;
      case 'warn':
        console.warn(logMessage, data ?? '');
        break;
      case 'error':
        console.error(logMessage, data ?? '');
        break;
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

  error(message: string, error?: unknown): void {
    const errorData = error instanceof Error
      ? { message: error.message, stack: error.stack }
      : error;
    this.log('error', message, errorData);
  }

  setLevel(level: LogThreshold): void {
    this.minLevel = level;
  }

  /**
   * Get recent log history (for debugging)
   */
  getHistory(level?: LogLevel): LogEntry[] {
    if (level) {
      return this.logHistory.filter(entry => entry.level === level);
    }
    return [...this.logHistory];
  }

  /**
   * Clear log history
   */
  clearHistory(): void {
    this.logHistory = [];
  }
}

// Export singleton instance
export const logger = new Logger({ minLevel: getEcmoConfig().logLevel });
