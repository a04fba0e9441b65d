/**
 * Latest Command
 *
 * Show the newest item in the album.
 */

import { basename } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import { AlbumLocator, FsStorage, parseCaptureName } from '@capture-relay/album';
import { formatBytes } from '@capture-relay/utils';
import { resolveAlbumRoot } from '../config/index.js';
import { commandLogger, fail, printHeader, printJson, printKeyValue, printWarning } from '../lib/output.js';

export interface LatestOptions {
  root?: string;
  json?: boolean;
  debug?: boolean;
}

export async function latestCommand(options: LatestOptions): Promise<void> {
  const root = resolveAlbumRoot(options.root);
  const storage = new FsStorage();
  const locator = new AlbumLocator({ root, storage, logger: commandLogger(options.debug) });
  const spinner = options.json ? null : ora(`Scanning ${root}...`).start();

  try {
    const result = await locator.locateNewest();
    spinner?.stop();

    if (!result.ok) {
      if (options.json) {
        printJson({ ready: false, level: result.error.level, reason: result.error.message });
      } else {
        printWarning(`Album not ready: ${result.error.message}`);
      }
      process.exitCode = 1;
      return;
    }

    const item = result.value;
    const size = await storage.statSize(item.path);
    const capture = parseCaptureName(basename(item.path));

    if (options.json) {
      printJson({ ready: true, ...item, size, capturedAt: capture?.capturedAt.toISOString() ?? null });
      return;
    }

    printHeader('Newest item');
    printKeyValue('Path', chalk.cyan(item.path));
    printKeyValue('Date', `${item.year}-${item.month}-${item.day}`);
    printKeyValue('Size', formatBytes(size));
    if (capture) {
      printKeyValue('Captured', capture.capturedAt.toLocaleString());
      printKeyValue('Source', capture.sourceId);
    }
  } catch (error) {
    spinner?.fail('Scan failed');
    fail(error);
  }
}
