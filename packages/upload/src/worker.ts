/**
 * Upload Worker
 *
 * Drains the queue once: every entry is offered to every enabled destination,
 * each with its own retry budget. Resolves when the queue is empty.
 */

import type {
  DeliveryMode,
  DestinationName,
  MediaKind,
  QueueEntry,
  Storage,
  UploadMode,
} from '@capture-relay/core';
import {
  createLogger,
  formatBytes,
  retryWithBackoff,
  sleep as defaultSleep,
  type Logger,
} from '@capture-relay/utils';
import { classifyMedia, getTransferPolicy, type TransferPolicy } from './policy.js';
import type { UploadQueue } from './queue.js';
import { acceptsKind, type Destination } from './targets/types.js';

export type DestinationOutcome = 'delivered' | 'failed' | 'skipped';

export interface DestinationReport {
  name: DestinationName;
  outcome: DestinationOutcome;
  attempts: number;
}

export interface ItemReport {
  entry: QueueEntry;
  kind: MediaKind;
  succeeded: boolean;
  destinations: DestinationReport[];
  // Set when the item failed before any destination was tried
  error?: string;
}

export interface WorkerSummary {
  processed: number;
  succeeded: number;
  failed: number;
  durationMs: number;
}

export interface UploadWorkerOptions {
  queue: UploadQueue;
  destinations: Destination[];
  storage: Storage;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  onItem?: (report: ItemReport) => void;
}

/**
 * Delivery modes tried inside one attempt, in order
 */
export function deliveryModes(mode: UploadMode | undefined): DeliveryMode[] {
  switch (mode) {
    case 'compressed':
      return ['compressed'];
    case 'both':
      return ['compressed', 'original'];
    default:
      return ['original'];
  }
}

export class UploadWorker {
  private readonly queue: UploadQueue;
  private readonly destinations: Destination[];
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onItem?: (report: ItemReport) => void;

  constructor(options: UploadWorkerOptions) {
    this.queue = options.queue;
    this.destinations = options.destinations;
    this.storage = options.storage;
    this.logger = options.logger ?? createLogger({ component: 'upload-worker' });
    this.sleep = options.sleep ?? defaultSleep;
    this.onItem = options.onItem;
  }

  async run(): Promise<WorkerSummary> {
    const startTime = Date.now();
    const summary: WorkerSummary = { processed: 0, succeeded: 0, failed: 0, durationMs: 0 };

    this.logger.debug({ pending: this.queue.size() }, 'Worker started');

    let entry = this.queue.dequeue();
    while (entry !== null) {
      const report = await this.processEntry(entry);
      summary.processed++;
      if (report.succeeded) {
        summary.succeeded++;
      } else {
        summary.failed++;
      }
      this.onItem?.(report);
      entry = this.queue.dequeue();
    }

    summary.durationMs = Date.now() - startTime;
    this.logger.debug({ ...summary }, 'Queue drained, worker exiting');
    return summary;
  }

  /**
   * Deliver one entry to every destination that takes its kind
   */
  async processEntry(entry: QueueEntry): Promise<ItemReport> {
    const kind = classifyMedia(entry.path);
    const policy = getTransferPolicy(kind);

    const size = await this.storage.statSize(entry.path);
    if (size === 0) {
      this.logger.error({ file: entry.path }, 'File is missing or empty, skipping');
      return {
        entry,
        kind,
        succeeded: false,
        destinations: [],
        error: 'File is missing or empty',
      };
    }

    this.logger.info(
      { file: entry.path, kind, size: formatBytes(size), destinations: this.destinations.length },
      'Processing upload'
    );

    const destinations: DestinationReport[] = [];
    for (const destination of this.destinations) {
      destinations.push(await this.deliverTo(destination, entry.path, size, kind, policy));
    }

    // A skip per the media filter counts as handled
    const succeeded = destinations.some(d => d.outcome !== 'failed');

    if (!succeeded) {
      this.logger.error({ file: entry.path }, 'All uploads failed');
    }

    return { entry, kind, succeeded, destinations };
  }

  private async deliverTo(
    destination: Destination,
    path: string,
    size: number,
    kind: MediaKind,
    policy: TransferPolicy
  ): Promise<DestinationReport> {
    const log = this.logger.child({ destination: destination.name });

    if (!acceptsKind(destination.settings, kind)) {
      log.info({ file: path, kind }, 'Destination does not take this media type, skipping');
      return { name: destination.name, outcome: 'skipped', attempts: 0 };
    }

    const modes = deliveryModes(destination.uploadMode);

    const { succeeded, attempts } = await retryWithBackoff(
      async () => {
        let any = false;
        for (const mode of modes) {
          if (await destination.deliver({ path, size, kind, mode, policy })) {
            any = true;
          }
        }
        return any;
      },
      {
        maxAttempts: policy.maxAttempts,
        sleep: this.sleep,
        onRetry: (nextAttempt, delayMs) => {
          log.warn(
            { file: path, attempt: nextAttempt, maxAttempts: policy.maxAttempts, delayMs },
            'Retrying upload'
          );
        },
        onError: (error, attempt) => {
          log.error(
            { file: path, attempt, error: error instanceof Error ? error.message : String(error) },
            'Delivery threw'
          );
        },
      }
    );

    if (!succeeded) {
      log.error({ file: path, attempts }, `Upload failed after ${attempts} attempts`);
      return { name: destination.name, outcome: 'failed', attempts };
    }

    return { name: destination.name, outcome: 'delivered', attempts };
  }
}
