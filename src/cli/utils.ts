import chalk from 'chalk';
import { stat } from 'fs/promises';

/**
 * CLI Utilities
 */

/** Width of divider lines and headers */
const LINE_WIDTH = 60;

// Styling helpers
export const styles = {
  header: (text: string) => chalk.bold.cyan(`\n${'═'.repeat(LINE_WIDTH)}\n  ${text}\n${'═'.repeat(LINE_WIDTH)}\n`),
  success: (text: string) => chalk.green(`✓ ${text}`),
  error: (text: string) => chalk.red(`✗ ${text}`),
  info: (text: string) => chalk.blue(`ℹ ${text}`),
  warn: (text: string) => chalk.yellow(`⚠ ${text}`),
  dim: (text: string) => chalk.dim(text),
  label: (label: string, value: string) => `${chalk.gray(label + ':')} ${chalk.white(value)}`,
  step: (num: number, text: string) => chalk.cyan(`[${num}] ${text}`),
};

export function printHeader(title: string): void {
  console.log(styles.header(title));
}

export function printStep(step: number, message: string): void {
  console.log(styles.step(step, message));
}

export function printSuccess(message: string): void {
  console.log(styles.success(message));
}

export function printError(message: string): void {
  console.log(styles.error(message));
}

export function printInfo(message: string): void {
  console.log(styles.info(message));
}

export function printWarn(message: string): void {
  console.log(styles.warn(message));
}

export function printLabel(label: string, value: string | number): void {
  console.log(styles.label(label, String(value)));
}

export function printDivider(): void {
  console.log(chalk.gray('─'.repeat(LINE_WIDTH)));
}

/**
 * Print raw text without formatting
 */
export function printRaw(text: string): void {
  console.log(text);
}

/**
 * Format file size in human readable format
 */
export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(2)} ${units[unitIndex]}`;
}

/**
 * Check if a path is a valid file
 */
export async function isValidFile(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * True when the prompt was closed with Ctrl+C
 */
export function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}
