/**
 * Structured logger with configurable verbosity
 * Lazy debug messages, batched console writes and an in-memory ring buffer
 */

import type { Candidate } from '../types/candidate';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
};

// Global log store for in-app viewing
const logStore: LogEntry[] = [];
const MAX_LOG_ENTRIES = 1000;
const liveLoggers = new Set<Logger>();

// Log level hierarchy
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

// Default log level from environment
const envLevel = process.env.LOG_LEVEL;
const DEFAULT_LOG_LEVEL: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export class Logger {
  private pendingLogs: LogEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private currentLevel: number;

  constructor(
    private module: string,
    level: LogLevel = DEFAULT_LOG_LEVEL
  ) {
    this.currentLevel = LOG_LEVELS[level];
    liveLoggers.add(this);
  }

  /**
   * Debug logging with lazy evaluation
   */
  debug(message: string | (() => string), data?: unknown | (() => unknown)) {
    if (this.currentLevel > LOG_LEVELS.debug) return;
    
    // Lazy evaluation - only compute if needed
    const actualMessage = typeof message === 'function' ? message() : message;
    const actualData = typeof data === 'function' ? data() : data;
    
    this.log('debug', actualMessage, actualData);
  }

  /**
   * Info logging
   */
  info(message: string, data?: unknown) {
    if (this.currentLevel > LOG_LEVELS.info) return;
    this.log('info', message, data);
  }

  /**
   * Warning logging
   */
  warn(message: string, data?: unknown) {
    if (this.currentLevel > LOG_LEVELS.warn) return;
    this.log('warn', message, data);
  }

  /**
   * Error logging
   */
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  /**
   * Log a section header for better organization
   */
  section(title: string, emoji = '📌') {
    if (this.currentLevel > LOG_LEVELS.info) return;
    
    const separator = '═'.repeat(35);
    const message = `${emoji} ${title.toUpperCase()}\n${separator}`;
    
    // Store formatted section in log store (console.log happens in flush)
    this.log('info', message);
  }

  /**
   * Log a summary with formatted key-value pairs
   */
  summary(data: Record<string, unknown>) {
    if (this.currentLevel > LOG_LEVELS.info) return;
    
    const lines: string[] = [];
    Object.entries(data).forEach(([key, value]) => {
      const formattedKey = key.replace(/_/g, ' ').replace(/\b\w/g, l => l.toUpperCase());
      const line = `  • ${formattedKey}: ${value}`;
      lines.push(line);
    });
    
    // Store formatted summary in log store (console.log happens in flush)
    this.log('info', lines.join('\n'));
  }

  /**
   * One-line summary of a ranked candidate
   */
  candidate(rank: number, c: Candidate) {
    if (this.currentLevel > LOG_LEVELS.info) return;

    const emoji = c.badge === 'HIGH' ? '🟢' : c.badge === 'MED' ? '🟡' : c.badge === 'LOW' ? '🔵' : '⚪';
    const price = c.ref_price > 0 ? `+${c.ref_price}` : `${c.ref_price}`;
    const line = c.market === 'h2h' ? '' : ` ${c.line}`;

    const message = `${emoji} #${rank} ${c.subject} ${c.market} ${c.side}${line} @ ${price} (${c.matchup})\n   Conf: ${c.confidence} ${c.badge} | EV: ${c.ev_pct.toFixed(2)}% | Kelly: ${c.kelly_pct.toFixed(2)}% | Corr: ${c.corr_flag}`;

    this.log('info', message);
  }

  /**
   * Log near-miss candidates for diagnostics (EV values in percent)
   */
  nearMiss(selection: string, evPct: number, thresholdPct: number, reason: string) {
    if (this.currentLevel > LOG_LEVELS.info) return;

    const missPercent = thresholdPct > 0 ? ((evPct / thresholdPct) * 100).toFixed(0) : '0';

    const message = `  ⚠️ Near miss: ${selection} (${evPct.toFixed(2)}% EV, needs ${thresholdPct.toFixed(2)}% - ${missPercent}% of threshold)\n     Reason: ${reason}`;

    this.log('info', message);
  }

  /**
   * Performance timing helper
   */
  time(label: string): () => void {
    if (this.currentLevel > LOG_LEVELS.debug) return () => {};
    
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} took ${duration.toFixed(2)}ms`);
    };
  }

  /**
   * Core logging function with batching
   */
  private log(level: LogLevel, message: string, data?: unknown) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: this.module,
      message,
      data,
    };

    // Add to in-memory store (circular buffer)
    logStore.push(entry);
    if (logStore.length > MAX_LOG_ENTRIES) {
      logStore.shift();
    }

    // Add to pending batch
    this.pendingLogs.push(entry);

    // Schedule flush
    if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => this.flush(), 10);
      // never hold the process open for pending output
      this.flushTimer.unref();
    }
  }

  /**
   * Flush pending logs to stderr, leaving stdout to command output
   */
  flush() {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.pendingLogs.length === 0) return;

    // Batch write to console
    for (const log of this.pendingLogs) {
      const prefix = `[${log.timestamp}] [${log.level.toUpperCase()}] [${log.module}]`;
      const color = this.getColor(log.level);
      
      console.error(`${color}${prefix}${this.resetColor()} ${log.message}`);
      
      if (log.data !== undefined) {
        console.error(JSON.stringify(log.data, null, 2));
      }
    }

    // Clear pending logs
    this.pendingLogs = [];
    this.flushTimer = null;
  }

  /**
   * Get color code for log level
   */
  private getColor(level: LogLevel): string {
    // Only use colors in development
    if (process.env.NODE_ENV === 'production') return '';
    
    switch (level) {
      case 'debug': return '\x1b[90m'; // Gray
      case 'info': return '\x1b[36m';  // Cyan
      case 'warn': return '\x1b[33m';  // Yellow
      case 'error': return '\x1b[31m'; // Red
    }
  }

  /**
   * Reset color
   */
  private resetColor(): string {
    return process.env.NODE_ENV === 'production' ? '' : '\x1b[0m';
  }
}

/**
 * Get all stored logs
 */
export function getStoredLogs(
  filter?: {
    level?: LogLevel;
    module?: string;
    startTime?: string;
    endTime?: string;
    search?: string;
  }
): LogEntry[] {
  let logs = [...logStore];

  if (filter) {
    if (filter.level) {
      const minLevel = LOG_LEVELS[filter.level];
      logs = logs.filter(log => LOG_LEVELS[log.level] >= minLevel);
    }

    if (filter.module) {
      const moduleFilter = filter.module;
      logs = logs.filter(log => log.module.includes(moduleFilter));
    }

    if (filter.startTime) {
      const startTimeFilter = filter.startTime;
      logs = logs.filter(log => log.timestamp >= startTimeFilter);
    }

    if (filter.endTime) {
      const endTimeFilter = filter.endTime;
      logs = logs.filter(log => log.timestamp <= endTimeFilter);
    }

    if (filter.search) {
      const searchLower = filter.search.toLowerCase();
      logs = logs.filter(log => 
        log.message.toLowerCase().includes(searchLower) ||
        (log.data && JSON.stringify(log.data).toLowerCase().includes(searchLower))
      );
    }
  }

  return logs;
}

/**
 * Write out everything still batched, e.g. before the process exits
 */
export function flushAllLogs() {
  for (const logger of liveLoggers) {
    logger.flush();
  }
}

/**
 * Clear stored logs
 */
export function clearStoredLogs() {
  logStore.length = 0;
}
