/**
 * Send Command
 *
 * Run one upload pass over a single file with the configured destinations.
 */

import { resolve } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import { FsStorage } from '@capture-relay/album';
import { createQueueEntry } from '@capture-relay/core';
import {
  DESTINATION_LABELS,
  UploadQueue,
  UploadWorker,
  closeHttpAgents,
  createDestinations,
  type DestinationOutcome,
  type ItemReport,
} from '@capture-relay/upload';
import { loadRelayConfig } from '../config/index.js';
import { commandLogger, fail, printError, printHeader, printSuccess, printWarning } from '../lib/output.js';

export interface SendOptions {
  debug?: boolean;
}

const outcomeColors: Record<DestinationOutcome, (text: string) => string> = {
  delivered: chalk.green,
  failed: chalk.red,
  skipped: chalk.gray,
};

export async function sendCommand(file: string, options: SendOptions): Promise<void> {
  const path = resolve(file);
  const logger = commandLogger(options.debug);

  try {
    const { config, warnings } = loadRelayConfig();
    warnings.forEach(printWarning);

    const storage = new FsStorage();
    const size = await storage.statSize(path);
    if (size === 0) {
      printError(`File is missing or empty: ${path}`);
      process.exitCode = 1;
      return;
    }

    const queue = new UploadQueue(1);
    queue.enqueue(createQueueEntry(path, size));

    const reports: ItemReport[] = [];
    const worker = new UploadWorker({
      queue,
      destinations: createDestinations(config.destinations, { storage, logger }),
      storage,
      logger,
      onItem: report => reports.push(report),
    });

    const spinner = ora(`Uploading ${path}...`).start();
    const summary = await worker.run();
    spinner.stop();

    const report = reports[0];
    printHeader('Upload result');
    for (const destination of report?.destinations ?? []) {
      const color = outcomeColors[destination.outcome];
      console.log(
        `  ${DESTINATION_LABELS[destination.name].padEnd(10)} ${color(destination.outcome.padEnd(10))} ` +
        chalk.gray(`${destination.attempts} attempt(s)`)
      );
    }
    console.log();

    if (summary.succeeded === 1) {
      printSuccess('Upload complete');
    } else {
      printError(report?.error ?? 'All uploads failed');
      process.exitCode = 1;
    }
  } catch (error) {
    fail(error);
  } finally {
    await closeHttpAgents();
  }
}
