/**
 * @capture-relay/core
 *
 * Core package containing:
 * - Shared album and upload types
 * - Storage contract
 * - Error handling
 * - Relay configuration schema
 */

// Types
export type { AlbumPath, HierarchyEntry, Result } from './types/album.js';
export { ok, err } from './types/album.js';

export type { Storage } from './types/storage.js';

export type {
  MediaKind,
  UploadMode,
  DeliveryMode,
  DestinationName,
  DestinationSettings,
  QueueEntry,
} from './types/upload.js';
export { UPLOAD_MODES, DEFAULT_MAX_PATH_LENGTH, createQueueEntry } from './types/upload.js';

// Errors
export {
  RelayError,
  ValidationError,
  ConfigError,
  AlbumNotReadyError,
  InvalidWatermarkError,
  type AlbumLevel,
} from './errors/index.js';

// Configuration
export {
  parseRelayConfig,
  maskSecrets,
  type RelayConfig,
  type ParsedRelayConfig,
  type ParseOptions,
  type DestinationsConfig,
  type TelegramConfig,
  type NtfyConfig,
  type DiscordConfig,
} from './config/relay.js';
