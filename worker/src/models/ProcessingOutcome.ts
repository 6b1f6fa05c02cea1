import type { ProcessingStatus } from '@retitler/shared/schemas/paperless.zod';

export interface ProcessingOutcome {
  status: ProcessingStatus;
  reason: string;
  title?: string;
}

export interface TrackingContext {
  enabled: boolean;
  /** Resolved once per run; may differ from the configured id. */
  fieldId: number;
  reprocess: boolean;
}

export const TRACKING_DISABLED: TrackingContext = Object.freeze({
  enabled: false,
  fieldId: 0,
  reprocess: false,
});

export function succeeded(reason: string, title?: string): ProcessingOutcome {
  return { status: 'succeeded', reason, title };
}

export function skipped(reason: string): ProcessingOutcome {
  return { status: 'skipped', reason };
}

export function failed(reason: string): ProcessingOutcome {
  return { status: 'failed', reason };
}
