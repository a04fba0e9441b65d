/**
 * @capture-relay/upload
 *
 * Upload layer.
 *
 * Supported destinations:
 * - Telegram (compressed, original or both)
 * - ntfy attachments
 * - Discord channel messages
 *
 * Features:
 * - Bounded drop-newest queue
 * - Per-media-kind retry budget and timeouts
 * - Fan-out with per-destination media filters
 */

// Queue
export { UploadQueue, DEFAULT_QUEUE_CAPACITY } from './queue.js';

// Transfer policy
export {
  TRANSFER_POLICIES,
  classifyMedia,
  getTransferPolicy,
  getMimeType,
  type TransferPolicy,
} from './policy.js';

// Worker
export {
  UploadWorker,
  deliveryModes,
  type DestinationOutcome,
  type DestinationReport,
  type ItemReport,
  type UploadWorkerOptions,
  type WorkerSummary,
} from './worker.js';

// Destinations
export {
  acceptsKind,
  DESTINATION_LABELS,
  type DeliveryRequest,
  type Destination,
} from './targets/types.js';
export { TelegramDestination, type TelegramClient } from './targets/telegram.js';
export { NtfyDestination } from './targets/ntfy.js';
export { DiscordDestination } from './targets/discord.js';
export { closeHttpAgents } from './targets/http.js';

// Router
export { createDestinations, describeDestinations, type DestinationDeps } from './router.js';
