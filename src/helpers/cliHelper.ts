/**
 * cli utility functions for the role tracker.
 * This module provides console logging and formatting helpers used across the application.
 *
 * @module helpers
 */

/**
 * Console color codes for formatted logging output
 */
export const colors = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m'
};

/**
 * Logger utility for consistent console output formatting
 */
export const logger = {
    info: (message: string) => console.log(`${colors.cyan}[INFO]${colors.reset} ${message}`),
    success: (message: string) => console.log(`${colors.green}[SUCCESS]${colors.reset} ${message}`),
    warning: (message: string) => console.log(`${colors.yellow}[WARNING]${colors.reset} ${message}`),
    error: (message: string) => console.error(`${colors.red}[ERROR]${colors.reset} ${message}`),
    debug: (message: string) => {
      // Only show debug messages if DEBUG environment variable is set
      if (process.env.DEBUG) {
        console.log(`${colors.dim}[DEBUG]${colors.reset} ${message}`);
      }
    },
    channel: (message: string) => console.log(`${colors.magenta}[CHANNEL]${colors.reset} ${message}`),
    progress: (message: string) => {
      // Clear the current line and write the progress message
      process.stdout.write(`\r${colors.blue}[PROGRESS]${colors.reset} ${message}`);
    },
    clearLine: () => {
      process.stdout.write('\r\x1b[K');
    }
};

/**
 * Creates a visual progress bar
 * @param {number} current - Current progress value
 * @param {number} total - Total progress value
 * @param {number} [width=30] - Width of the progress bar in characters
 * @returns {string} Formatted progress bar string
 */
export function createProgressBar(current: number, total: number, width: number = 30): string {
  if (total <= 0) {
    return `[${'░'.repeat(width)}] 0.0%`;
  }
  const ratio = Math.min(current / total, 1);
  const filledWidth = Math.round(width * ratio);
  const bar = '█'.repeat(filledWidth) + '░'.repeat(width - filledWidth);
  return `[${bar}] ${(ratio * 100).toFixed(1)}%`;
}

/**
 * Formats a number with thousands separators
 * @param {number} num - Number to format
 * @returns {string} Formatted number string
 */
export function formatNumber(num: number): string {
  return num.toString().replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}
