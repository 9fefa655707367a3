import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  APP_EVENTS,
  type SyncCompletedEvent,
  type SyncFailedEvent,
  type SyncStartedEvent,
} from '../events/app.events';
import type { SyncJob } from './sync.types';

const MAX_JOBS = 50;

/** In-memory record of the most recent sync jobs. */
@Injectable()
export class SyncJobRegistry {
  private readonly jobs = new Map<string, SyncJob>();

  @OnEvent(APP_EVENTS.SYNC_STARTED)
  onSyncStarted(event: SyncStartedEvent): void {
    this.jobs.set(event.jobId, {
      id: event.jobId,
      database_id: event.databaseId,
      status: 'running',
      force_update: event.forceUpdate,
      page_limit: event.pageLimit,
      started_at: new Date().toISOString(),
    });

    for (const id of this.jobs.keys()) {
      if (this.jobs.size <= MAX_JOBS) break;
      this.jobs.delete(id);
    }
  }

  @OnEvent(APP_EVENTS.SYNC_COMPLETED)
  onSyncCompleted(event: SyncCompletedEvent): void {
    const job = this.jobs.get(event.jobId);
    if (!job) return;
    job.status = 'completed';
    job.finished_at = new Date().toISOString();
    job.result = event.result;
  }

  @OnEvent(APP_EVENTS.SYNC_FAILED)
  onSyncFailed(event: SyncFailedEvent): void {
    const job = this.jobs.get(event.jobId);
    if (!job) return;
    job.status = 'failed';
    job.finished_at = new Date().toISOString();
    job.error = event.error;
  }

  /** Newest first. */
  list(): SyncJob[] {
    return [...this.jobs.values()].reverse();
  }

  get(id: string): SyncJob | undefined {
    return this.jobs.get(id);
  }
}
