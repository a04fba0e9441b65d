/**
 * Destination Router
 *
 * Builds the enabled destinations from configuration, always in the order
 * telegram, ntfy, discord.
 */

import type { DestinationsConfig, Storage } from '@capture-relay/core';
import { createLogger, type Logger } from '@capture-relay/utils';
import type { Dispatcher } from 'undici';
import type { TransferPolicy } from './policy.js';
import { DiscordDestination } from './targets/discord.js';
import { NtfyDestination } from './targets/ntfy.js';
import { TelegramDestination, type TelegramClient } from './targets/telegram.js';
import { DESTINATION_LABELS, type Destination } from './targets/types.js';

export interface DestinationDeps {
  storage: Storage;
  logger?: Logger;
  dispatcher?: Dispatcher;
  createTelegramClient?: (policy: TransferPolicy) => TelegramClient;
}

export function createDestinations(
  config: DestinationsConfig,
  deps: DestinationDeps
): Destination[] {
  const parent = deps.logger;
  const childLogger = (destination: string): Logger | undefined =>
    parent ? createLogger({ destination }, parent) : undefined;

  const destinations: Destination[] = [];

  if (config.telegram.enabled) {
    destinations.push(new TelegramDestination({
      config: config.telegram,
      storage: deps.storage,
      logger: childLogger('telegram'),
      createClient: deps.createTelegramClient,
    }));
  }

  if (config.ntfy.enabled) {
    destinations.push(new NtfyDestination({
      config: config.ntfy,
      storage: deps.storage,
      logger: childLogger('ntfy'),
      dispatcher: deps.dispatcher,
    }));
  }

  if (config.discord.enabled) {
    destinations.push(new DiscordDestination({
      config: config.discord,
      logger: childLogger('discord'),
      dispatcher: deps.dispatcher,
    }));
  }

  return destinations;
}

/**
 * One line per destination for the startup log, e.g. "Telegram (mode: both)"
 */
export function describeDestinations(destinations: Destination[]): string[] {
  return destinations.map(destination => {
    const label = DESTINATION_LABELS[destination.name];
    return destination.uploadMode
      ? `${label} (mode: ${destination.uploadMode})`
      : label;
  });
}
