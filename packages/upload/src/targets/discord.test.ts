import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, afterEach, before, beforeEach, describe, it } from 'node:test';
import { MockAgent } from 'undici';

import type { DiscordConfig } from '@capture-relay/core';
import { silentLogger } from '@capture-relay/utils';
import { getTransferPolicy } from '../policy.js';
import { DiscordDestination } from './discord.js';

const ORIGIN = 'https://discord.example.test';
const MESSAGES = '/api/v10/channels/1234/messages';

const config: DiscordConfig = {
  enabled: true,
  uploadScreenshots: true,
  uploadMovies: false,
  botToken: 'test-secret',
  channelId: '1234',
  apiUrl: `${ORIGIN}/api/v10`,
};

describe('DiscordDestination', () => {
  let dir: string;
  let file: string;
  let agent: MockAgent;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'discord-test-'));
    file = join(dir, 'shot.png');
    await writeFile(file, 'png-bytes');
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  const deliver = (path: string) => new DiscordDestination({
    config,
    logger: silentLogger(),
    dispatcher: agent,
  }).deliver({
    path,
    size: 9,
    kind: 'image',
    mode: 'original',
    policy: getTransferPolicy('image'),
  });

  it('posts the attachment and succeeds on 200', async () => {
    agent.get(ORIGIN).intercept({ path: MESSAGES, method: 'POST' }).reply(200, '{"id":"1"}');

    assert.equal(await deliver(file), true);
    agent.assertNoPendingInterceptors();
  });

  it('accepts 201', async () => {
    agent.get(ORIGIN).intercept({ path: MESSAGES, method: 'POST' }).reply(201, '{"id":"1"}');

    assert.equal(await deliver(file), true);
  });

  it('fails on 401', async () => {
    agent.get(ORIGIN).intercept({ path: MESSAGES, method: 'POST' }).reply(401, '{}');

    assert.equal(await deliver(file), false);
  });

  it('fails when the file cannot be opened', async () => {
    assert.equal(await deliver(join(dir, 'gone.png')), false);
  });
});
