/**
 * ntfy Destination
 *
 * PUTs the raw file to `<url>/<topic>`; ntfy turns it into an attachment
 * notification. Always sends the original file.
 */

import { basename } from 'node:path';
import { request, type Dispatcher } from 'undici';
import type { DestinationSettings, NtfyConfig, Storage } from '@capture-relay/core';
import { parseCaptureName } from '@capture-relay/album';
import { createLogger, formatBytes, type Logger } from '@capture-relay/utils';
import { dispatcherFor, errorMessage, timeoutOptions } from './http.js';
import type { DeliveryRequest, Destination } from './types.js';

export interface NtfyDestinationOptions {
  config: NtfyConfig;
  storage: Storage;
  logger?: Logger;
  // Overrides the per-policy agent; tests pass a MockAgent
  dispatcher?: Dispatcher;
}

export class NtfyDestination implements Destination {
  readonly name = 'ntfy' as const;
  private readonly config: NtfyConfig;
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly dispatcher?: Dispatcher;

  constructor(options: NtfyDestinationOptions) {
    this.config = options.config;
    this.storage = options.storage;
    this.logger = options.logger ?? createLogger({ destination: 'ntfy' });
    this.dispatcher = options.dispatcher;
  }

  get settings(): DestinationSettings {
    return this.config;
  }

  async deliver({ path, size, kind, policy }: DeliveryRequest): Promise<boolean> {
    this.logger.info({ file: path, size: formatBytes(size) }, 'Starting upload');

    if (!this.config.topic) {
      this.logger.error('Topic is not configured');
      return false;
    }

    const filename = basename(path);
    const stream = this.storage.openForRead(path);

    try {
      const { statusCode, body } = await request(
        `${this.config.url}/${encodeURIComponent(this.config.topic)}`,
        {
          method: 'PUT',
          body: stream,
          headers: this.buildHeaders(filename, kind, size),
          dispatcher: this.dispatcher ?? dispatcherFor(policy),
          ...timeoutOptions(policy),
        }
      );
      await body.dump();

      if (statusCode === 200) {
        this.logger.info({ file: path }, 'Successfully uploaded');
        return true;
      }

      this.logger.error({ statusCode, file: path, size }, 'HTTP error');
      return false;
    } catch (error) {
      this.logger.error({ error: errorMessage(error), file: path }, 'Transfer failed');
      return false;
    } finally {
      stream.destroy();
    }
  }

  buildHeaders(filename: string, kind: DeliveryRequest['kind'], size: number): Record<string, string> {
    const capture = parseCaptureName(filename);
    const label = kind === 'video' ? 'Video' : 'Screenshot';

    const headers: Record<string, string> = {
      'Content-Length': String(size),
      Filename: filename,
      Title: `${label} from ${capture?.sourceId ?? filename}`,
    };

    if (this.config.token) {
      headers['Authorization'] = `Bearer ${this.config.token}`;
    }
    if (this.config.priority && this.config.priority !== 'default') {
      headers['Priority'] = this.config.priority;
    }

    return headers;
  }
}
