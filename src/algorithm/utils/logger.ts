/**
 * Wall Panel Optimizer - Logging Utility
 *
 * Levelled logging for the layout pipeline. Output goes to a sink (the console
 * by default) so a host application can route it elsewhere.
 *
 * The starting level comes from WALL_PANEL_LOG_LEVEL when set
 * (debug | info | warn | error | none), otherwise WARN.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4
}

/**
 * Where log lines end up. `console` satisfies this.
 */
export interface LogSink {
  log(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
  off: LogLevel.NONE
};

/**
 * Level from its name, case-insensitive; undefined when unrecognised
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (name === undefined) return undefined;
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

let currentLevel: LogLevel = parseLogLevel(process.env.WALL_PANEL_LOG_LEVEL) ?? LogLevel.WARN;
let sink: LogSink = console;

export const Logger = {
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  getLevel: (): LogLevel => currentLevel,

  /**
   * Routes output to `next`; returns the previous sink so it can be restored
   */
  setSink: (next: LogSink): LogSink => {
    const previous = sink;
    sink = next;
    return previous;
  },

  /**
   * Algorithm trace: bridge/stop/hop decisions, seam fixes, gap-fill rows
   */
  debug: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.DEBUG) {
      sink.log(`[DEBUG] ${msg}`, ...args);
    }
  },

  /**
   * Per-wall summaries and row counts
   */
  info: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.INFO) {
      sink.log(`[INFO] ${msg}`, ...args);
    }
  },

  /**
   * Degenerate geometry: skipped regions and rows, unbridgeable openings, clamped seams
   */
  warn: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.WARN) {
      sink.warn(`[WARN] ${msg}`, ...args);
    }
  },

  error: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.ERROR) {
      sink.error(`[ERROR] ${msg}`, ...args);
    }
  }
};

export function enableDebugLogging(): void {
  Logger.setLevel(LogLevel.DEBUG);
}

export function disableLogging(): void {
  Logger.setLevel(LogLevel.NONE);
}
