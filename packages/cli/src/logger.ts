/**
 * Debug logger for the appship CLI
 * Appends every az invocation and failure to .appship/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

const STATE_DIR = '.appship';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let logFilePath: string | null = null;
let sessionStarted = false;
let enabled = process.env.APPSHIP_DEBUG_LOG !== 'off';

/**
 * Point the log at a specific file (tests, custom state dirs)
 */
export function configureLogger(options: { filePath?: string; enabled?: boolean }): void {
  if (options.filePath !== undefined) {
    logFilePath = options.filePath;
    sessionStarted = false;
  }
  if (options.enabled !== undefined) {
    enabled = options.enabled;
  }
}

export function isLoggingEnabled(): boolean {
  return enabled;
}

/**
 * Get the debug log file path.
 * Uses ./.appship when present, otherwise ~/.appship
 */
export function getLogPath(): string {
  if (!logFilePath) {
    const localDir = path.join(process.cwd(), STATE_DIR);
    const homeDir = path.join(homedir(), STATE_DIR);

    if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else {
      fs.mkdirSync(homeDir, { recursive: true });
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

function rotate(logPath: string): void {
  if (!fs.existsSync(logPath) || fs.statSync(logPath).size <= MAX_LOG_SIZE) {
    return;
  }
  const backupPath = `${logPath}.old`;
  fs.rmSync(backupPath, { force: true });
  fs.renameSync(logPath, backupPath);
}

function append(entry: string): void {
  if (!enabled) return;

  try {
    const logPath = getLogPath();
    if (!sessionStarted) {
      sessionStarted = true;
      rotate(logPath);
      const separator = '='.repeat(80);
      fs.appendFileSync(
        logPath,
        `\n${separator}\n[${new Date().toISOString()}] appship session started (pid ${process.pid})\n${separator}\n`
      );
    }
    fs.appendFileSync(logPath, entry);
  } catch (error) {
    // Stop logging after the first failed write.
    enabled = false;
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`  debug log disabled: ${message}\n`);
  }
}

/**
 * Format a log entry
 */
export function formatEntry(level: string, message: string, data?: unknown, now: Date = new Date()): string {
  let entry = `[${now.toISOString()}] [${level}] ${message}`;

  if (data instanceof Error) {
    entry += `\n  Error: ${data.message}`;
    if (data.stack) {
      entry += `\n  Stack: ${data.stack}`;
    }
  } else if (data !== undefined && typeof data === 'object') {
    let serialized: string;
    try {
      serialized = JSON.stringify(data, null, 2);
    } catch {
      serialized = '[unserializable]';
    }
    entry += `\n  Data: ${serialized.split('\n').join('\n  ')}`;
  } else if (data !== undefined) {
    entry += `\n  Data: ${String(data)}`;
  }

  return entry + '\n';
}

function writeLog(level: string, message: string, data?: unknown): void {
  append(formatEntry(level, message, data));
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log an external command before it runs
 */
export function logCommand(command: string, args?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, args);
}

/**
 * Log command output (stdout/stderr)
 */
export function logOutput(type: 'stdout' | 'stderr', output: string): void {
  if (output.trim()) {
    writeLog(type.toUpperCase(), output.trim());
  }
}

/**
 * Log a full error with context
 */
export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  const errorData: Record<string, unknown> = { context, ...additionalData };

  if (error instanceof Error) {
    errorData.errorName = error.name;
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}

export interface CommandLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

/**
 * Create a logger that prefixes entries with the command name
 */
export function createCommandLogger(commandName: string): CommandLogger {
  return {
    info: (message, data) => logInfo(`[${commandName}] ${message}`, data),
    warn: (message, data) => logWarn(`[${commandName}] ${message}`, data),
    error: (message, data) => logError(`[${commandName}] ${message}`, data),
    debug: (message, data) => logDebug(`[${commandName}] ${message}`, data),
  };
}
