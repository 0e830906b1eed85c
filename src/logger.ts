import { writeFile, appendFile } from 'fs/promises';
import chalk from 'chalk';

// Module-scoped log file path
let logFilePath: string | null = null;

// Module-scoped verbose flag
let isVerbose = false;

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Initializes the logger. When a path is given the log file is truncated and
 * every debug line is appended to it.
 */
export async function initLogger(
  path: string | undefined,
  verbose: boolean = false,
): Promise<void> {
  logFilePath = path ?? null;
  isVerbose = verbose;
  if (logFilePath) {
    await writeFile(logFilePath, '', 'utf-8');
  }
}

export function resetLogger(): void {
  logFilePath = null;
  isVerbose = false;
}

/**
 * Logs a message to the log file only (for debugging/audit).
 * ANSI color codes are automatically stripped.
 */
export async function logDebug(message: string): Promise<void> {
  if (!logFilePath) return;

  const cleanMessage = stripAnsi(message);
  const timestamp = new Date().toISOString();
  const logEntry = `[${timestamp}] ${cleanMessage}\n`;

  try {
    await appendFile(logFilePath, logEntry, 'utf-8');
  } catch (error) {
    // Don't let log failures crash the program
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Failed to write to log file: ${errorMsg}`));
  }
}

/**
 * Logs a message to the console only (user-facing).
 */
export function logInfo(message: string): void {
  console.log(message);
}

/**
 * Prints diagnostic detail to stderr and the log file, in verbose mode only.
 * Stdout stays reserved for command output.
 */
export async function logVerbose(message: string): Promise<void> {
  if (!isVerbose) return;
  console.error(chalk.dim(message));
  await logDebug(`[VERBOSE] ${message}`);
}

export async function logError(
  message: string,
  error?: unknown,
): Promise<void> {
  console.error(chalk.red(`✗ Error: ${message}`));
  if (error !== undefined) {
    const details = error instanceof Error ? error.message : String(error);
    await logDebug(`ERROR: ${message}. Details: ${details}`);
  } else {
    await logDebug(`ERROR: ${message}`);
  }
}
