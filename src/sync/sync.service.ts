import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../common/errors';
import {
  APP_EVENTS,
  type SyncCompletedEvent,
  type SyncFailedEvent,
  type SyncStartedEvent,
} from '../events/app.events';
import { NotionContentService } from '../notion/notion-content.service';
import {
  NOTION_SOURCE,
  type NotionDocumentSource,
  type NotionPageObject,
} from '../notion/notion.types';
import { VectorstoreService } from '../vectorstore/vectorstore.service';
import { SyncTaskRunner } from './sync-task.runner';
import type { SyncResult } from './sync.types';

const NOTION_PAGE_SIZE = 100;

export function parseDatabaseIds(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

@Injectable()
export class SyncService {
  private readonly logger = new Logger(SyncService.name);
  readonly databaseIds: string[];

  constructor(
    private readonly config: ConfigService,
    @Inject(NOTION_SOURCE) private readonly notion: NotionDocumentSource,
    private readonly content: NotionContentService,
    private readonly vs: VectorstoreService,
    private readonly runner: SyncTaskRunner,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.databaseIds = parseDatabaseIds(
      this.config.get<string>('NOTION_DATABASE_IDS'),
    );
  }

  /**
   * Spawns one background job per configured database and returns their ids
   * without waiting for any page to be processed.
   */
  startSync(forceUpdate: boolean, pageLimit: number | null): string[] {
    if (!this.notion.configured) {
      throw new Error('Notion client is not configured (NOTION_API_KEY missing)');
    }

    return this.databaseIds.map((databaseId) => {
      const jobId = uuidv4();
      this.eventEmitter.emit(APP_EVENTS.SYNC_STARTED, {
        jobId,
        databaseId,
        forceUpdate,
        pageLimit,
      } satisfies SyncStartedEvent);

      this.runner.spawn(`sync:${databaseId}`, () =>
        this.runJob(jobId, databaseId, forceUpdate, pageLimit),
      );
      return jobId;
    });
  }

  /** Syncs one database. A failing page is counted and skipped. */
  async syncDatabase(
    databaseId: string,
    forceUpdate: boolean,
    pageLimit: number | null,
  ): Promise<SyncResult> {
    this.logger.log(`Starting background sync for database ${databaseId}`);

    const pages = await this.fetchPages(databaseId, pageLimit);
    this.logger.log(`Found ${pages.length} pages to sync in ${databaseId}`);

    const result: SyncResult = {
      success: 0,
      skipped: 0,
      errors: 0,
      total_chunks: 0,
    };

    for (const page of pages) {
      try {
        const content = await this.fetchContent(page.id);
        const stored = await this.vs.storeNotionPage({
          pageId: page.id,
          page: { ...page, content },
          databaseId,
          forceUpdate,
        });

        if (stored.status === 'success') {
          result.success += 1;
          result.total_chunks += stored.chunks_stored;
        } else {
          result.skipped += 1;
        }
      } catch (error) {
        this.logger.error(`Error syncing page ${page.id}: ${errorMessage(error)}`);
        result.errors += 1;
      }
    }

    this.logger.log(
      `Database ${databaseId} sync completed: ${JSON.stringify(result)}`,
    );
    return result;
  }

  private async runJob(
    jobId: string,
    databaseId: string,
    forceUpdate: boolean,
    pageLimit: number | null,
  ): Promise<void> {
    try {
      const result = await this.syncDatabase(databaseId, forceUpdate, pageLimit);
      this.eventEmitter.emit(APP_EVENTS.SYNC_COMPLETED, {
        jobId,
        databaseId,
        result,
      } satisfies SyncCompletedEvent);
    } catch (error) {
      this.logger.error(
        `Error in background sync of database ${databaseId}: ${errorMessage(error)}`,
      );
      this.eventEmitter.emit(APP_EVENTS.SYNC_FAILED, {
        jobId,
        databaseId,
        error: errorMessage(error),
      } satisfies SyncFailedEvent);
    }
  }

  private async fetchPages(
    databaseId: string,
    pageLimit: number | null,
  ): Promise<NotionPageObject[]> {
    const pages: NotionPageObject[] = [];
    let cursor: string | undefined;
    let hasMore = true;

    while (hasMore && (pageLimit === null || pages.length < pageLimit)) {
      const remaining =
        pageLimit === null ? NOTION_PAGE_SIZE : pageLimit - pages.length;
      const batch = await this.notion.queryDatabase({
        databaseId,
        pageSize: Math.min(NOTION_PAGE_SIZE, remaining),
        ...(cursor ? { startCursor: cursor } : {}),
      });

      pages.push(...batch.results);
      hasMore = batch.hasMore && batch.nextCursor !== null;
      cursor = batch.nextCursor ?? undefined;
    }

    return pageLimit === null ? pages : pages.slice(0, pageLimit);
  }

  private async fetchContent(pageId: string): Promise<string[]> {
    const content: string[] = [];
    let cursor: string | undefined;

    do {
      const batch = await this.notion.listBlockChildren(pageId, cursor);
      for (const block of batch.results) {
        content.push(this.content.extractBlockContent(block));
      }
      cursor = batch.hasMore && batch.nextCursor ? batch.nextCursor : undefined;
    } while (cursor !== undefined);

    return content;
  }
}
