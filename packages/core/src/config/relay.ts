/**
 * Relay Configuration
 *
 * Flat, section-qualified key/value settings (TELEGRAM_*, NTFY_*, DISCORD_*
 * and the general keys), validated once at startup. Apps load `.env`
 * themselves and hand the raw environment to `parseRelayConfig`.
 */

import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { UPLOAD_MODES, type DestinationSettings, type UploadMode } from '../types/upload.js';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);

const flag = (fallback: boolean) =>
  z.string().optional().transform(value => {
    if (value === undefined || value.trim() === '') {
      return fallback;
    }
    return TRUE_VALUES.has(value.trim().toLowerCase());
  });

const text = (fallback: string) => z.string().trim().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FILE: z.string().trim().optional(),
  KEEP_LOGS: flag(false),

  // Album
  ALBUM_ROOT: text('./album'),
  CHECK_INTERVAL_SECONDS: z.coerce.number().int().default(5)
    .transform(seconds => Math.max(seconds, 1)),
  QUEUE_CAPACITY: z.coerce.number().int().min(1).max(1024).default(8),

  // Health check (0 disables the server)
  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(0),

  // Telegram
  TELEGRAM_ENABLED: flag(false),
  TELEGRAM_BOT_TOKEN: text(''),
  TELEGRAM_CHAT_ID: text(''),
  TELEGRAM_API_URL: z.string().url().default('https://api.telegram.org'),
  TELEGRAM_UPLOAD_SCREENSHOTS: flag(true),
  TELEGRAM_UPLOAD_MOVIES: flag(true),
  TELEGRAM_UPLOAD_MODE: z.enum(UPLOAD_MODES).catch('compressed'),

  // ntfy
  NTFY_ENABLED: flag(false),
  NTFY_URL: z.string().url().default('https://ntfy.sh'),
  NTFY_TOPIC: text(''),
  NTFY_TOKEN: text(''),
  NTFY_PRIORITY: text('default'),
  NTFY_UPLOAD_SCREENSHOTS: flag(true),
  NTFY_UPLOAD_MOVIES: flag(false),

  // Discord
  DISCORD_ENABLED: flag(false),
  DISCORD_BOT_TOKEN: text(''),
  DISCORD_CHANNEL_ID: text(''),
  DISCORD_API_URL: z.string().url().default('https://discord.com/api/v10'),
  DISCORD_UPLOAD_SCREENSHOTS: flag(true),
  DISCORD_UPLOAD_MOVIES: flag(false),
});

export interface TelegramConfig extends DestinationSettings {
  botToken: string;
  chatId: string;
  apiUrl: string;
  uploadMode: UploadMode;
}

export interface NtfyConfig extends DestinationSettings {
  url: string;
  topic: string;
  token: string;
  priority: string;
}

export interface DiscordConfig extends DestinationSettings {
  botToken: string;
  channelId: string;
  apiUrl: string;
}

export interface DestinationsConfig {
  telegram: TelegramConfig;
  ntfy: NtfyConfig;
  discord: DiscordConfig;
}

export interface RelayConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  logFile?: string;
  keepLogs: boolean;
  albumRoot: string;
  checkIntervalSeconds: number;
  queueCapacity: number;
  healthPort: number;
  destinations: DestinationsConfig;
}

export interface ParsedRelayConfig {
  config: RelayConfig;
  // Non-fatal problems, e.g. a channel disabled because it is incomplete
  warnings: string[];
}

export interface ParseOptions {
  // Relative paths resolve against this directory
  baseDir?: string;
}

/**
 * Validate a raw environment into a RelayConfig.
 *
 * A channel that is enabled but misconfigured is switched off with a
 * warning; no usable channel at all is a ConfigError.
 */
export function parseRelayConfig(
  env: Record<string, string | undefined>,
  options: ParseOptions = {}
): ParsedRelayConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      issue => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError('Invalid environment configuration', issues);
  }

  const parsed = parseResult.data;
  const warnings: string[] = [];

  const rawMode = env['TELEGRAM_UPLOAD_MODE']?.trim();
  if (rawMode && rawMode !== parsed.TELEGRAM_UPLOAD_MODE) {
    warnings.push(`Unknown TELEGRAM_UPLOAD_MODE "${rawMode}", using "compressed"`);
  }

  const telegram: TelegramConfig = {
    enabled: parsed.TELEGRAM_ENABLED,
    botToken: parsed.TELEGRAM_BOT_TOKEN,
    chatId: parsed.TELEGRAM_CHAT_ID,
    apiUrl: stripTrailingSlash(parsed.TELEGRAM_API_URL),
    uploadScreenshots: parsed.TELEGRAM_UPLOAD_SCREENSHOTS,
    uploadMovies: parsed.TELEGRAM_UPLOAD_MOVIES,
    uploadMode: parsed.TELEGRAM_UPLOAD_MODE,
  };
  if (telegram.enabled && (!telegram.botToken || !telegram.chatId)) {
    telegram.enabled = false;
    warnings.push('Telegram disabled: TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required');
  }

  const ntfy: NtfyConfig = {
    enabled: parsed.NTFY_ENABLED,
    url: stripTrailingSlash(parsed.NTFY_URL),
    topic: parsed.NTFY_TOPIC,
    token: parsed.NTFY_TOKEN,
    priority: parsed.NTFY_PRIORITY,
    uploadScreenshots: parsed.NTFY_UPLOAD_SCREENSHOTS,
    uploadMovies: parsed.NTFY_UPLOAD_MOVIES,
  };
  if (ntfy.enabled && !ntfy.topic) {
    ntfy.enabled = false;
    warnings.push('ntfy disabled: NTFY_TOPIC is required');
  }

  const discord: DiscordConfig = {
    enabled: parsed.DISCORD_ENABLED,
    botToken: parsed.DISCORD_BOT_TOKEN,
    channelId: parsed.DISCORD_CHANNEL_ID,
    apiUrl: stripTrailingSlash(parsed.DISCORD_API_URL),
    uploadScreenshots: parsed.DISCORD_UPLOAD_SCREENSHOTS,
    uploadMovies: parsed.DISCORD_UPLOAD_MOVIES,
  };
  if (discord.enabled && (!discord.botToken || !discord.channelId)) {
    discord.enabled = false;
    warnings.push('Discord disabled: DISCORD_BOT_TOKEN and DISCORD_CHANNEL_ID are required');
  }

  if (!telegram.enabled && !ntfy.enabled && !discord.enabled) {
    throw new ConfigError(
      'No valid upload channel available (Telegram, ntfy and Discord are disabled or misconfigured)',
      warnings
    );
  }

  const baseDir = options.baseDir ?? process.cwd();

  return {
    config: {
      nodeEnv: parsed.NODE_ENV,
      logLevel: parsed.LOG_LEVEL,
      logFile: parsed.LOG_FILE ? resolvePath(baseDir, parsed.LOG_FILE) : undefined,
      keepLogs: parsed.KEEP_LOGS,
      albumRoot: resolvePath(baseDir, parsed.ALBUM_ROOT),
      checkIntervalSeconds: parsed.CHECK_INTERVAL_SECONDS,
      queueCapacity: parsed.QUEUE_CAPACITY,
      healthPort: parsed.HEALTH_PORT,
      destinations: { telegram, ntfy, discord },
    },
    warnings,
  };
}

/**
 * Copy of the config that is safe to print
 */
export function maskSecrets(config: RelayConfig): RelayConfig {
  const { telegram, ntfy, discord } = config.destinations;
  return {
    ...config,
    destinations: {
      telegram: { ...telegram, botToken: mask(telegram.botToken) },
      ntfy: { ...ntfy, token: mask(ntfy.token) },
      discord: { ...discord, botToken: mask(discord.botToken) },
    },
  };
}

function mask(secret: string): string {
  return secret ? `${secret.slice(0, 4)}****` : '';
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function resolvePath(baseDir: string, p: string): string {
  return isAbsolute(p) ? p : resolve(baseDir, p);
}
