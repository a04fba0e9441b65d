import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { DestinationsConfig } from '@capture-relay/core';
import { silentLogger } from '@capture-relay/utils';
import { createDestinations, describeDestinations } from './router.js';
import { MemoryStorage } from './testing/fakes.js';

function destinationsConfig(enabled: { telegram: boolean; ntfy: boolean; discord: boolean }): DestinationsConfig {
  const filters = { uploadScreenshots: true, uploadMovies: true };
  return {
    telegram: {
      enabled: enabled.telegram,
      ...filters,
      botToken: 'test-secret',
      chatId: '1',
      apiUrl: 'https://telegram.example.test',
      uploadMode: 'compressed',
    },
    ntfy: {
      enabled: enabled.ntfy,
      ...filters,
      url: 'https://ntfy.example.test',
      topic: 'captures',
      token: '',
      priority: 'default',
    },
    discord: {
      enabled: enabled.discord,
      ...filters,
      botToken: 'test-secret',
      channelId: '2',
      apiUrl: 'https://discord.example.test',
    },
  };
}

describe('createDestinations', () => {
  const deps = { storage: new MemoryStorage(), logger: silentLogger() };

  it('builds enabled destinations in a fixed order', () => {
    const destinations = createDestinations(
      destinationsConfig({ telegram: true, ntfy: true, discord: true }),
      deps
    );

    assert.deepEqual(destinations.map(d => d.name), ['telegram', 'ntfy', 'discord']);
  });

  it('leaves out disabled destinations', () => {
    const destinations = createDestinations(
      destinationsConfig({ telegram: false, ntfy: false, discord: true }),
      deps
    );

    assert.deepEqual(destinations.map(d => d.name), ['discord']);
  });
});

describe('describeDestinations', () => {
  it('labels each destination and shows the Telegram mode', () => {
    const destinations = createDestinations(
      destinationsConfig({ telegram: true, ntfy: true, discord: false }),
      { storage: new MemoryStorage(), logger: silentLogger() }
    );

    assert.deepEqual(describeDestinations(destinations), ['Telegram (mode: compressed)', 'ntfy']);
  });
});
