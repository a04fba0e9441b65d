/**
 * Capture Detector
 *
 * Polls the album, queues items newer than the watermark and keeps at most
 * one upload worker draining the queue.
 *
 * Events:
 * - `queued` (entry): an item entered the queue
 * - `dropped` (entry): the queue was full; the item is retried next poll
 * - `item` (report): the worker finished an item
 * - `worker:start` / `worker:exit` (summary)
 * - `error` (error): a poll or worker run failed unexpectedly
 */

import { EventEmitter } from 'node:events';
import type { AlbumLocator } from '@capture-relay/album';
import {
  DEFAULT_MAX_PATH_LENGTH,
  createQueueEntry,
  type AlbumPath,
  type QueueEntry,
  type Storage,
} from '@capture-relay/core';
import {
  UploadWorker,
  type Destination,
  type ItemReport,
  type UploadQueue,
  type WorkerSummary,
} from '@capture-relay/upload';
import { createLogger, type Logger } from '@capture-relay/utils';

export interface CaptureDetectorOptions {
  locator: AlbumLocator;
  storage: Storage;
  queue: UploadQueue;
  destinations: Destination[];
  intervalMs: number;
  // Longer paths are skipped
  maxPathLength?: number;
  logger?: Logger;
  // Backoff sleep handed to each worker
  workerSleep?: (ms: number) => Promise<void>;
}

export interface DetectorStatus {
  watermark: string | null;
  queueSize: number;
  queueCapacity: number;
  workerActive: boolean;
  polls: number;
  queued: number;
  dropped: number;
  delivered: number;
  failed: number;
  lastPollAt: string | null;
}

export interface DetectorEvents {
  queued: [entry: QueueEntry];
  dropped: [entry: QueueEntry];
  item: [report: ItemReport];
  'worker:start': [];
  'worker:exit': [summary: WorkerSummary];
  error: [error: unknown];
}

export class CaptureDetector extends EventEmitter<DetectorEvents> {
  private readonly locator: AlbumLocator;
  private readonly storage: Storage;
  private readonly queue: UploadQueue;
  private readonly destinations: Destination[];
  private readonly intervalMs: number;
  private readonly maxPathLength: number;
  private readonly logger: Logger;
  private readonly workerSleep?: (ms: number) => Promise<void>;

  private watermark: string | null = null;
  private worker: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopping = false;

  private readonly counters = { polls: 0, queued: 0, dropped: 0, delivered: 0, failed: 0 };
  private lastPollAt: Date | null = null;

  constructor(options: CaptureDetectorOptions) {
    super();
    this.locator = options.locator;
    this.storage = options.storage;
    this.queue = options.queue;
    this.destinations = options.destinations;
    this.intervalMs = options.intervalMs;
    this.maxPathLength = options.maxPathLength ?? DEFAULT_MAX_PATH_LENGTH;
    this.logger = options.logger ?? createLogger({ component: 'detector' });
    this.workerSleep = options.workerSleep;
  }

  /**
   * Cold start: skip the existing backlog by starting at the newest item
   */
  async initialize(): Promise<void> {
    this.watermark = null;

    try {
      const newest = await this.locator.locateNewest();

      if (newest.ok) {
        this.watermark = newest.value.path;
        this.logger.info({ watermark: this.watermark }, 'Starting from newest item');
      } else {
        this.logger.info({ reason: newest.error.message }, 'Album not ready');
      }
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Initial album scan failed'
      );
      this.reportError(error);
    }
  }

  /**
   * One detection pass; resolves to the number of items queued
   */
  async poll(): Promise<number> {
    this.counters.polls++;
    this.lastPollAt = new Date();

    let queued = 0;

    try {
      for (const item of await this.findNew()) {
        const size = await this.storage.statSize(item.path);
        if (size === 0) {
          this.logger.debug({ file: item.path }, 'Skipping empty or vanished file');
          continue;
        }

        if (item.path.length > this.maxPathLength) {
          this.logger.error(
            { file: item.path, length: item.path.length, maxPathLength: this.maxPathLength },
            'Path too long, skipping'
          );
          this.watermark = item.path;
          continue;
        }

        const entry = createQueueEntry(item.path, size, this.maxPathLength);
        if (!this.queue.enqueue(entry)) {
          this.counters.dropped++;
          this.logger.warn(
            { file: item.path, capacity: this.queue.capacity },
            'Upload queue full, retrying on next poll'
          );
          this.emit('dropped', entry);
          break;
        }

        this.watermark = item.path;
        this.counters.queued++;
        queued++;
        this.logger.info({ file: item.path, size }, 'Queued for upload');
        this.emit('queued', entry);
        this.ensureWorker();
      }

      if (this.queue.size() > 0) {
        this.ensureWorker();
      }
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Poll failed'
      );
      this.reportError(error);
    }

    return queued;
  }

  /**
   * Spawn a worker unless one is active; true when a worker was started
   */
  ensureWorker(): boolean {
    if (this.worker !== null || this.stopping) {
      return false;
    }

    const worker = new UploadWorker({
      queue: this.queue,
      destinations: this.destinations,
      storage: this.storage,
      logger: createLogger({ component: 'upload-worker' }, this.logger),
      sleep: this.workerSleep,
      onItem: report => {
        if (report.succeeded) {
          this.counters.delivered++;
        } else {
          this.counters.failed++;
        }
        this.emit('item', report);
      },
    });

    this.emit('worker:start');

    this.worker = worker.run()
      .then(
        summary => {
          this.emit('worker:exit', summary);
        },
        (error: unknown) => {
          this.logger.error(
            { error: error instanceof Error ? error.message : String(error) },
            'Upload worker crashed'
          );
          this.reportError(error);
        }
      )
      .finally(() => {
        this.worker = null;
        // Entries queued while the worker was finishing up
        if (this.queue.size() > 0) {
          this.ensureWorker();
        }
      });

    return true;
  }

  /**
   * Resolves once no worker is active
   */
  async waitForWorker(): Promise<void> {
    while (this.worker !== null) {
      await this.worker;
    }
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.stopping = false;

    await this.initialize();
    this.logger.info({ intervalMs: this.intervalMs }, 'Detector started');
    this.schedule();
  }

  async stop(): Promise<void> {
    this.running = false;
    this.stopping = true;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    await this.waitForWorker();
    this.logger.info({ pending: this.queue.size() }, 'Detector stopped');
  }

  getStatus(): DetectorStatus {
    return {
      watermark: this.watermark,
      queueSize: this.queue.size(),
      queueCapacity: this.queue.capacity,
      workerActive: this.worker !== null,
      ...this.counters,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
    };
  }

  private schedule(): void {
    if (!this.running) {
      return;
    }
    // poll() catches its own errors
    this.timer = setTimeout(() => {
      void this.poll().then(() => this.schedule());
    }, this.intervalMs);
  }

  private async findNew(): Promise<AlbumPath[]> {
    if (this.watermark === null) {
      const newest = await this.locator.locateNewest();
      if (!newest.ok) {
        this.logger.debug({ reason: newest.error.message }, 'Album not ready');
        return [];
      }
      return [newest.value];
    }

    const newer = await this.locator.locateNewerThan(this.watermark);
    if (!newer.ok) {
      this.logger.warn({ error: newer.error.message }, 'Resetting invalid watermark');
      this.watermark = null;
      return [];
    }
    return newer.value;
  }

  private reportError(error: unknown): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}
