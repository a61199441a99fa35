/**
 * Centralized fault logger for reposcope.
 *
 * Two channels:
 * 1. Local file: <data dir>/reposcope.log (JSON lines, with rotation)
 * 2. Console: stderr echo, enabled by the daemon and by --verbose
 */

import fs from 'node:fs';
import path from 'node:path';
import { getLogPath, getLoggingConfig } from './config.js';

export type FaultLevel = 'error' | 'warn' | 'info' | 'debug';

export interface FaultEntry {
  timestamp: string;
  level: FaultLevel;
  component: string;
  message: string;
  code?: string;
  stack?: string;
  context?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<FaultLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// ---------------------------------------------------------------------------
// Channel 1: Local file with rotation
// ---------------------------------------------------------------------------

function rotateIfNeeded(logPath: string, maxSizeMb: number): void {
  try {
    const stats = fs.statSync(logPath);
    if (stats.size > maxSizeMb * 1024 * 1024) {
      fs.renameSync(logPath, logPath + '.1');
    }
  } catch {
    // File doesn't exist yet, appendFileSync creates it
  }
}

function writeToFile(entry: FaultEntry, maxSizeMb: number): void {
  try {
    const logPath = getLogPath();
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    rotateIfNeeded(logPath, maxSizeMb);
    fs.appendFileSync(logPath, JSON.stringify(entry) + '\n');
  } catch {
    // Never break caller
  }
}

// ---------------------------------------------------------------------------
// Channel 2: Console echo
// ---------------------------------------------------------------------------

let consoleLevel: FaultLevel | null = null;

/**
 * Echo entries at or above `level` to stderr. Pass null to turn it off.
 */
export function setConsoleLogging(level: FaultLevel | null): void {
  consoleLevel = level;
}

function writeToConsole(entry: FaultEntry): void {
  const ctx = entry.context ? ' ' + JSON.stringify(entry.context) : '';
  process.stderr.write(`[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.component}: ${entry.message}${ctx}\n`);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Log a fault to all configured channels.
 * Never throws.
 */
export function logFault(
  level: FaultLevel,
  component: string,
  message: string,
  opts?: { error?: unknown; context?: Record<string, unknown> }
): void {
  try {
    const error = opts?.error;
    const entry: FaultEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      code: hasCode(error) ? error.code : undefined,
      stack: error instanceof Error ? error.stack : undefined,
      context: opts?.context,
    };

    if (consoleLevel && LEVEL_ORDER[level] >= LEVEL_ORDER[consoleLevel]) {
      writeToConsole(entry);
    }

    const config = getLoggingConfig();
    if (!config.enabled) return;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[config.level]) return;

    writeToFile(entry, config.max_file_size_mb);
  } catch {
    // Absolutely never break the caller
  }
}

function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/** Log an error (convenience wrapper). */
export function logError(
  component: string,
  message: string,
  error?: unknown,
  context?: Record<string, unknown>
): void {
  logFault('error', component, message, { error, context });
}

/** Log a warning (convenience wrapper). */
export function logWarn(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('warn', component, message, { context });
}

/** Log an info message (convenience wrapper). */
export function logInfo(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('info', component, message, { context });
}

export function logDebug(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('debug', component, message, { context });
}
