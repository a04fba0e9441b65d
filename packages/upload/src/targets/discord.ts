/**
 * Discord Destination
 *
 * Posts the file as a message attachment (`files[0]`) through the bot API.
 * Always sends the original file.
 */

import { openAsBlob } from 'node:fs';
import { basename } from 'node:path';
import { FormData, request, type Dispatcher } from 'undici';
import type { DestinationSettings, DiscordConfig } from '@capture-relay/core';
import { createLogger, formatBytes, type Logger } from '@capture-relay/utils';
import { getMimeType } from '../policy.js';
import { dispatcherFor, errorMessage, timeoutOptions } from './http.js';
import type { DeliveryRequest, Destination } from './types.js';

export interface DiscordDestinationOptions {
  config: DiscordConfig;
  logger?: Logger;
  dispatcher?: Dispatcher;
}

export class DiscordDestination implements Destination {
  readonly name = 'discord' as const;
  private readonly config: DiscordConfig;
  private readonly logger: Logger;
  private readonly dispatcher?: Dispatcher;

  constructor(options: DiscordDestinationOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger({ destination: 'discord' });
    this.dispatcher = options.dispatcher;
  }

  get settings(): DestinationSettings {
    return this.config;
  }

  async deliver({ path, size, policy }: DeliveryRequest): Promise<boolean> {
    this.logger.info({ file: path, size: formatBytes(size) }, 'Starting upload');

    try {
      const form = new FormData();
      form.append('files[0]', await openAsBlob(path, { type: getMimeType(path) }), basename(path));

      const { statusCode, body } = await request(
        `${this.config.apiUrl}/channels/${this.config.channelId}/messages`,
        {
          method: 'POST',
          body: form,
          headers: { Authorization: `Bot ${this.config.botToken}` },
          dispatcher: this.dispatcher ?? dispatcherFor(policy),
          ...timeoutOptions(policy),
        }
      );
      await body.dump();

      if (statusCode === 200 || statusCode === 201) {
        this.logger.info({ file: path }, 'Successfully uploaded');
        return true;
      }

      this.logger.error({ statusCode, file: path, size }, 'HTTP error');
      return false;
    } catch (error) {
      this.logger.error({ error: errorMessage(error), file: path }, 'Transfer failed');
      return false;
    }
  }
}
