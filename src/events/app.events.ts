import type { SyncResult } from '../sync/sync.types';

export const APP_EVENTS = {
  SYNC_STARTED: 'sync.started',
  SYNC_COMPLETED: 'sync.completed',
  SYNC_FAILED: 'sync.failed',
} as const;

// ── Sync events ───────────────────────────────────────────────────────────────

export interface SyncStartedEvent {
  jobId: string;
  databaseId: string;
  forceUpdate: boolean;
  pageLimit: number | null;
}

export interface SyncCompletedEvent {
  jobId: string;
  databaseId: string;
  result: SyncResult;
}

export interface SyncFailedEvent {
  jobId: string;
  databaseId: string;
  error: string;
}
