import pino from 'pino';
import chalk from 'chalk';
import type { LogLevel } from './config.js';

/**
 * Create a Pino logger instance shared by the producer and consumer processes
 * The level starts at info; entry points apply the configured level with {@link setLogLevel}
 */
const logger = pino({
  level: 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      singleLine: false,
      timeFormat: 'HH:mm:ss Z',
      // Custom color scheme
      colors: {
        50: 'bgRed', // fatal
        40: 'red', // error
        30: 'yellow', // warn
        20: 'green', // info
        10: 'blue', // debug
      },
    },
  },
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Print a block of pre-formatted lines (e.g. the text histogram) indented under a title
 */
export function printBlock(title: string, lines: string[]): void {
  console.log(`\n  ${chalk.bold(title)}`);
  for (const line of lines) {
    console.log(`  ${chalk.cyan(line)}`);
  }
  console.log();
}

/**
 * Print styled section headers for configuration display
 */
export function printHeader(title: string): void {
  const padding = Math.max(0, (50 - title.length) / 2);
  console.log(chalk.bold.cyan(`\n${'═'.repeat(60)}`));
  console.log(chalk.bold.cyan(`${' '.repeat(Math.floor(padding))}${title}`));
  console.log(chalk.bold.cyan(`${'═'.repeat(60)}\n`));
}

/**
 * Print a styled configuration item
 */
export function printConfig(
  key: string,
  value: string | number | boolean
): void {
  const formattedValue =
    typeof value === 'boolean'
      ? value
        ? chalk.green('✓ Enabled')
        : chalk.red('✗ Disabled')
      : chalk.cyan(String(value));
  console.log(`  ${chalk.dim(key)}: ${formattedValue}`);
}

/**
 * Print a section divider
 */
export function printDivider(): void {
  console.log(chalk.dim('─'.repeat(60)));
}

/**
 * Print startup success message
 */
export function printStartupSuccess(message: string): void {
  console.log(`\n${chalk.bold.green('✓')} ${chalk.bold.green(message)}\n`);
}

/**
 * Print startup error message
 */
export function printStartupError(message: string): void {
  console.log(`\n${chalk.bold.red('✗')} ${chalk.bold.red(message)}\n`);
}

export default logger;
