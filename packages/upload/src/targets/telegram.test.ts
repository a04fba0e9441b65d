import assert from 'node:assert/strict';
import { beforeEach, describe, it } from 'node:test';
import { GrammyError, HttpError, InputFile } from 'grammy';

import type { DeliveryMode, MediaKind, TelegramConfig } from '@capture-relay/core';
import { silentLogger } from '@capture-relay/utils';
import { getTransferPolicy, type TransferPolicy } from '../policy.js';
import { MemoryStorage } from '../testing/fakes.js';
import { TelegramDestination, type TelegramClient } from './telegram.js';

const PATH = '/album/2024/01/15/shot.jpg';

interface SentFile {
  method: string;
  chatId: string;
  filename: string | undefined;
}

class FakeClient implements TelegramClient {
  readonly sent: SentFile[] = [];
  failure: Error | null = null;

  sendPhoto(chatId: string, file: InputFile) {
    return this.record('sendPhoto', chatId, file);
  }

  sendVideo(chatId: string, file: InputFile) {
    return this.record('sendVideo', chatId, file);
  }

  sendDocument(chatId: string, file: InputFile) {
    return this.record('sendDocument', chatId, file);
  }

  private async record(method: string, chatId: string, file: InputFile): Promise<unknown> {
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push({ method, chatId, filename: file.filename });
    return { message_id: this.sent.length };
  }
}

const config: TelegramConfig = {
  enabled: true,
  uploadScreenshots: true,
  uploadMovies: true,
  botToken: 'test-secret',
  chatId: '-100123',
  apiUrl: 'https://telegram.example.test',
  uploadMode: 'both',
};

describe('TelegramDestination', () => {
  let client: FakeClient;
  let storage: MemoryStorage;
  let policies: TransferPolicy[];
  let destination: TelegramDestination;

  const deliver = (kind: MediaKind, mode: DeliveryMode) => destination.deliver({
    path: PATH,
    size: 11,
    kind,
    mode,
    policy: getTransferPolicy(kind),
  });

  beforeEach(() => {
    client = new FakeClient();
    storage = new MemoryStorage(new Map([[PATH, 'image-bytes']]));
    policies = [];
    destination = new TelegramDestination({
      config,
      storage,
      logger: silentLogger(),
      createClient: policy => {
        policies.push(policy);
        return client;
      },
    });
  });

  it('exposes the configured upload mode', () => {
    assert.equal(destination.uploadMode, 'both');
  });

  it('sends a compressed image as a photo', async () => {
    assert.equal(await deliver('image', 'compressed'), true);
    assert.deepEqual(client.sent, [{ method: 'sendPhoto', chatId: '-100123', filename: 'shot.jpg' }]);
    assert.deepEqual(storage.opened, [PATH]);
  });

  it('sends a compressed video as a video', async () => {
    assert.equal(await deliver('video', 'compressed'), true);
    assert.equal(client.sent[0]?.method, 'sendVideo');
    assert.equal(policies[0]?.totalTimeoutMs, 300_000);
  });

  it('sends the original as a document', async () => {
    assert.equal(await deliver('image', 'original'), true);
    assert.equal(client.sent[0]?.method, 'sendDocument');
  });

  it('fails on an API error', async () => {
    client.failure = new GrammyError(
      'Call to sendPhoto failed',
      { ok: false, error_code: 413, description: 'Request Entity Too Large' },
      'sendPhoto',
      {}
    );

    assert.equal(await deliver('image', 'compressed'), false);
  });

  it('fails on a network error', async () => {
    client.failure = new HttpError('Network request failed', new Error('ECONNRESET'));

    assert.equal(await deliver('image', 'original'), false);
  });
});
