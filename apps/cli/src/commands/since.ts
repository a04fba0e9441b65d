/**
 * Since Command
 *
 * List every item newer than a watermark path, oldest first.
 */

import { resolve } from 'node:path';
import ora from 'ora';
import { AlbumLocator, FsStorage } from '@capture-relay/album';
import { formatBytes } from '@capture-relay/utils';
import { resolveAlbumRoot } from '../config/index.js';
import { commandLogger, fail, printError, printInfo, printJson, printTable } from '../lib/output.js';

export interface SinceOptions {
  root?: string;
  json?: boolean;
  debug?: boolean;
}

export async function sinceCommand(watermark: string, options: SinceOptions): Promise<void> {
  const root = resolveAlbumRoot(options.root);
  const storage = new FsStorage();
  const locator = new AlbumLocator({ root, storage, logger: commandLogger(options.debug) });
  const spinner = options.json ? null : ora('Comparing album against watermark...').start();

  try {
    const result = await locator.locateNewerThan(resolve(watermark));
    spinner?.stop();

    if (!result.ok) {
      printError(result.error.message);
      process.exitCode = 1;
      return;
    }

    const items = await Promise.all(result.value.map(async item => ({
      path: item.path,
      date: `${item.year}-${item.month}-${item.day}`,
      size: await storage.statSize(item.path),
    })));

    if (options.json) {
      printJson(items);
      return;
    }

    if (items.length === 0) {
      printInfo('No items newer than the watermark');
      return;
    }

    printTable(items.map(item => ({ ...item, size: formatBytes(item.size) })));
    printInfo(`${items.length} item(s) newer than the watermark`);
  } catch (error) {
    spinner?.fail('Scan failed');
    fail(error);
  }
}
