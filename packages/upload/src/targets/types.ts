/**
 * Destination Contract
 */

import type {
  DeliveryMode,
  DestinationName,
  DestinationSettings,
  MediaKind,
  UploadMode,
} from '@capture-relay/core';
import type { TransferPolicy } from '../policy.js';

export interface DeliveryRequest {
  path: string;
  size: number;
  kind: MediaKind;
  mode: DeliveryMode;
  policy: TransferPolicy;
}

export interface Destination {
  readonly name: DestinationName;
  readonly settings: DestinationSettings;
  // Set only by destinations that can send a compressed form
  readonly uploadMode?: UploadMode;

  /**
   * One delivery attempt. Resolves false on any transport or HTTP failure.
   */
  deliver(request: DeliveryRequest): Promise<boolean>;
}

export function acceptsKind(settings: DestinationSettings, kind: MediaKind): boolean {
  return kind === 'video' ? settings.uploadMovies : settings.uploadScreenshots;
}

export const DESTINATION_LABELS: Record<DestinationName, string> = {
  telegram: 'Telegram',
  ntfy: 'ntfy',
  discord: 'Discord',
};
