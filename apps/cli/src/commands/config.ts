/**
 * Config Command
 *
 * Print the effective configuration with secrets masked.
 */

import chalk from 'chalk';
import { maskSecrets, type DestinationName } from '@capture-relay/core';
import { DESTINATION_LABELS } from '@capture-relay/upload';
import { loadRelayConfig } from '../config/index.js';
import { fail, printHeader, printJson, printKeyValue, printWarning } from '../lib/output.js';

export interface ConfigOptions {
  json?: boolean;
}

const DESTINATION_ORDER: DestinationName[] = ['telegram', 'ntfy', 'discord'];

export function configCommand(options: ConfigOptions): void {
  try {
    const { config, warnings } = loadRelayConfig();
    const masked = maskSecrets(config);

    if (options.json) {
      printJson({ config: masked, warnings });
      return;
    }

    printHeader('Relay configuration');
    printKeyValue('Album root', masked.albumRoot);
    printKeyValue('Check interval', `${masked.checkIntervalSeconds}s`);
    printKeyValue('Queue capacity', masked.queueCapacity);
    printKeyValue('Log level', masked.logLevel);
    printKeyValue('Log file', masked.logFile ?? chalk.gray('(stdout)'));
    printKeyValue('Health port', masked.healthPort > 0 ? masked.healthPort : chalk.gray('disabled'));

    for (const name of DESTINATION_ORDER) {
      const destination = masked.destinations[name];
      console.log();
      console.log(chalk.bold(DESTINATION_LABELS[name]), destination.enabled ? chalk.green('enabled') : chalk.gray('disabled'));
      for (const [key, value] of Object.entries(destination)) {
        if (key !== 'enabled') {
          printKeyValue(key, value);
        }
      }
    }

    if (warnings.length > 0) {
      console.log();
      warnings.forEach(printWarning);
    }
  } catch (error) {
    fail(error);
  }
}
