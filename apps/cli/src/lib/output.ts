/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { ConfigError } from '@capture-relay/core';
import { buildLogger, silentLogger, type Logger } from '@capture-relay/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printTable(data: Record<string, unknown>[]): void {
  if (data.length === 0) {
    printInfo('No data to display');
    return;
  }
  console.table(data);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Print an error (with config issues, if any) and exit 1
 */
export function fail(error: unknown): never {
  if (error instanceof ConfigError) {
    printError(error.message);
    for (const issue of error.issues) {
      console.error(chalk.gray(`  - ${issue}`));
    }
  } else {
    printError(error instanceof Error ? error.message : 'Unknown error');
  }
  process.exit(1);
}

/**
 * Library logs stay quiet unless --debug is given
 */
export function commandLogger(debug: boolean | undefined): Logger {
  return debug ? buildLogger({ level: 'debug', service: 'capture-relay-cli' }) : silentLogger();
}
