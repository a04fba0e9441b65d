/**
 * Telegram Destination
 *
 * The only dual-mode destination: `compressed` goes through sendPhoto or
 * sendVideo (Telegram recompresses), `original` through sendDocument.
 */

import { basename } from 'node:path';
import { Api, GrammyError, HttpError, InputFile } from 'grammy';
import type {
  DestinationSettings,
  Storage,
  TelegramConfig,
  UploadMode,
} from '@capture-relay/core';
import { createLogger, formatBytes, type Logger } from '@capture-relay/utils';
import type { TransferPolicy } from '../policy.js';
import { errorMessage } from './http.js';
import type { DeliveryRequest, Destination } from './types.js';

type SendMethod = 'sendPhoto' | 'sendVideo' | 'sendDocument';

/**
 * The slice of the grammy Api this destination calls
 */
export interface TelegramClient {
  sendPhoto(chatId: string, photo: InputFile, other?: { caption?: string }): Promise<unknown>;
  sendVideo(chatId: string, video: InputFile, other?: { caption?: string }): Promise<unknown>;
  sendDocument(chatId: string, document: InputFile, other?: { caption?: string }): Promise<unknown>;
}

export interface TelegramDestinationOptions {
  config: TelegramConfig;
  storage: Storage;
  logger?: Logger;
  createClient?: (policy: TransferPolicy) => TelegramClient;
}

export class TelegramDestination implements Destination {
  readonly name = 'telegram' as const;
  private readonly config: TelegramConfig;
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly createClient: (policy: TransferPolicy) => TelegramClient;

  constructor(options: TelegramDestinationOptions) {
    this.config = options.config;
    this.storage = options.storage;
    this.logger = options.logger ?? createLogger({ destination: 'telegram' });
    this.createClient = options.createClient ?? (policy => new Api(this.config.botToken, {
      apiRoot: this.config.apiUrl,
      timeoutSeconds: Math.ceil(policy.totalTimeoutMs / 1000),
    }));
  }

  get settings(): DestinationSettings {
    return this.config;
  }

  get uploadMode(): UploadMode {
    return this.config.uploadMode;
  }

  async deliver({ path, size, kind, mode, policy }: DeliveryRequest): Promise<boolean> {
    const method: SendMethod = mode === 'original'
      ? 'sendDocument'
      : kind === 'video' ? 'sendVideo' : 'sendPhoto';

    this.logger.info(
      { file: path, size: formatBytes(size), mode, method },
      'Starting upload'
    );

    const stream = this.storage.openForRead(path);

    try {
      const client = this.createClient(policy);
      await client[method](this.config.chatId, new InputFile(stream, basename(path)));
      this.logger.info({ file: path, mode }, 'Successfully uploaded');
      return true;
    } catch (error) {
      if (error instanceof GrammyError) {
        this.logger.error(
          { errorCode: error.error_code, description: error.description, file: path },
          'Telegram API error'
        );
      } else if (error instanceof HttpError) {
        this.logger.error({ error: errorMessage(error.error), file: path }, 'Network error');
      } else {
        this.logger.error({ error: errorMessage(error), file: path }, 'Transfer failed');
      }
      return false;
    } finally {
      stream.destroy();
    }
  }
}
