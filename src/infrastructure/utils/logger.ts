/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { RandomUtils } from "@/shared/utils/RandomUtils";
import { LogLevel, LogCategory } from "@/shared/constants/LogEnums";

/**
 * Logging utility for the simulation with behavior analysis support.
 *
 * Features:
 * - Console output with colored levels
 * - Bounded memory buffer for post-run inspection
 * - Category-based logging for subsystem identification
 * - Round context stamped on every entry
 * - Aggregated metrics per category/level
 * - Export to JSON for offline analysis
 * - Throttling to prevent log spam
 */

/**
 * Extended log entry with category and round context.
 */
export interface LogEntry {
  /** Unique identifier for this log entry */
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  /** Unix timestamp for sorting/filtering */
  timestampMs: number;
  /** Optional agent id if the log relates to a specific agent */
  agentId?: number;
  /** Simulation round when the log was created */
  round?: number;
  /** Additional structured data */
  data?: unknown;
}

/**
 * Aggregated metrics for analysis.
 */
export interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  startTime: number;
  endTime: number;
  totalCount: number;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  agentId?: number;
  round?: number;
  /** Text search in message */
  messageContains?: string;
  /** Maximum results, newest kept */
  limit?: number;
}

export interface LoggerConfig {
  /** Entries below this level are dropped */
  minLevel: LogLevel;
  /** Write entries to the console as well as the buffer */
  console: boolean;
  maxMemoryLogs: number;
  throttleWindowMs: number;
  maxThrottleCount: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

export const parseLogLevel = (
  input: string | undefined,
  fallback: LogLevel = LogLevel.INFO,
): LogLevel => {
  const match = Object.values(LogLevel).find(
    (level) => level === input?.toLowerCase(),
  );
  return match ?? fallback;
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: parseLogLevel(process.env.LOG_LEVEL),
  console: process.env.LOG_CONSOLE !== "false",
  maxMemoryLogs: Number(process.env.LOG_MAX_MEMORY ?? 5000),
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 50),
};

/**
 * Generate a unique ID for log entries.
 */
function generateLogId(): string {
  return `${Date.now()}-${RandomUtils.float().toString(36).substring(2, 9)}`;
}

function isLogCategory(value: unknown): value is LogCategory {
  return (
    typeof value === "string" &&
    Object.values<string>(LogCategory).includes(value)
  );
}

/**
 * Logger with memory buffering and analysis support.
 * Console: levels at or above `minLevel`, with colors
 * Memory: the same entries with full metadata, capped at `maxMemoryLogs`
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private metrics: LogMetrics;
  private currentRound?: number;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();
  }

  private initMetrics(): LogMetrics {
    const now = Date.now();
    return {
      byLevel: {
        [LogLevel.DEBUG]: 0,
        [LogLevel.INFO]: 0,
        [LogLevel.WARN]: 0,
        [LogLevel.ERROR]: 0,
      },
      byCategory: {
        [LogCategory.SIMULATION]: 0,
        [LogCategory.ENCOUNTER]: 0,
        [LogCategory.STRATEGY]: 0,
        [LogCategory.POPULATION]: 0,
        [LogCategory.CONFIG]: 0,
        [LogCategory.REPORT]: 0,
        [LogCategory.GENERAL]: 0,
      },
      startTime: now,
      endTime: now,
      totalCount: 0,
    };
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
    timestamp: string,
  ): string {
    const reset = "\x1b[0m";
    return `${LEVEL_COLORS[level]}[${timestamp}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.evictStaleThrottleEntries(now);
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private evictStaleThrottleEntries(now: number): void {
    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs) {
        this.throttleMap.delete(key);
      }
    }
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.shift();
    }

    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;
  }

  /**
   * Set the current simulation round for log context.
   * Pass undefined once the run is over.
   */
  setRound(round: number | undefined): void {
    this.currentRound = round;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.minLevel];
  }

  /**
   * Log with explicit category and options.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { agentId?: number; data?: unknown },
  ): void {
    if (!this.isEnabled(level)) return;
    if (this.shouldThrottle(message)) return;

    const now = Date.now();
    const entry: LogEntry = {
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      agentId: options?.agentId,
      round: this.currentRound,
      data: options?.data,
    };
    this.addToMemory(entry);

    if (!this.config.console) return;

    const consoleMsg = this.formatConsoleMessage(
      level,
      category,
      message,
      entry.timestamp,
    );
    const data = options?.data ?? "";
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data);
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data);
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data);
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data);
        break;
    }
  }

  private logWithOptionalCategory(
    level: LogLevel,
    message: string,
    categoryOrData?: LogCategory | unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
      return;
    }
    this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
  }

  debug(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Log an agent-specific event.
   */
  agentLog(
    level: LogLevel,
    category: LogCategory,
    agentId: number,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Agent:${agentId}] ${message}`, {
      agentId,
      data,
    });
  }

  getMetrics(): LogMetrics {
    return {
      ...this.metrics,
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
    };
  }

  /** Distinct messages currently inside a throttle window. */
  getTrackedMessageCount(): number {
    return this.throttleMap.size;
  }

  resetMetrics(): void {
    this.metrics = this.initMetrics();
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, agentId, round, messageContains, limit } =
      filter;
    let results = [...this.memoryBuffer];

    if (levels?.length) {
      results = results.filter((e) => levels.includes(e.level));
    }
    if (categories?.length) {
      results = results.filter((e) => categories.includes(e.category));
    }
    if (agentId !== undefined) {
      results = results.filter((e) => e.agentId === agentId);
    }
    if (round !== undefined) {
      results = results.filter((e) => e.round === round);
    }
    if (messageContains) {
      const search = messageContains.toLowerCase();
      results = results.filter((e) => e.message.toLowerCase().includes(search));
    }
    if (limit) {
      results = results.slice(-limit);
    }

    return results;
  }

  /**
   * Export logs to a JSON file for analysis.
   * @returns number of exported entries
   */
  async exportLogs(outputPath: string, filter: LogFilter = {}): Promise<number> {
    const logs = this.queryLogs(filter);
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(
      outputPath,
      JSON.stringify(logs, null, 2),
      "utf-8",
    );
    return logs.length;
  }

  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
  }
}

export const logger = new Logger();
