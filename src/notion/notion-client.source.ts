import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client } from '@notionhq/client';
import type {
  DatabaseQuery,
  NotionBlock,
  NotionDocumentSource,
  NotionList,
  NotionPageObject,
} from './notion.types';

@Injectable()
export class NotionClientSource implements NotionDocumentSource {
  private readonly logger = new Logger(NotionClientSource.name);
  private readonly client: Client | null;

  constructor(private readonly config: ConfigService) {
    const auth = this.config.get<string>('NOTION_API_KEY');
    this.client = auth ? new Client({ auth }) : null;
    if (!this.client) {
      this.logger.warn('NOTION_API_KEY is not set, Notion sync is disabled');
    }
  }

  get configured(): boolean {
    return this.client !== null;
  }

  async queryDatabase({
    databaseId,
    pageSize,
    startCursor,
  }: DatabaseQuery): Promise<NotionList<NotionPageObject>> {
    const response = await this.requireClient().databases.query({
      database_id: databaseId,
      page_size: pageSize,
      ...(startCursor ? { start_cursor: startCursor } : {}),
    });

    // Partial pages carry no properties to index
    const pages: NotionPageObject[] = response.results.flatMap((result) =>
      result.object === 'page' && 'url' in result ? [result] : [],
    );
    return {
      results: pages,
      hasMore: response.has_more,
      nextCursor: response.next_cursor,
    };
  }

  async listBlockChildren(
    blockId: string,
    startCursor?: string,
  ): Promise<NotionList<NotionBlock>> {
    const response = await this.requireClient().blocks.children.list({
      block_id: blockId,
      page_size: 100,
      ...(startCursor ? { start_cursor: startCursor } : {}),
    });

    const blocks: NotionBlock[] = response.results.flatMap((result) =>
      'type' in result ? [result] : [],
    );
    return {
      results: blocks,
      hasMore: response.has_more,
      nextCursor: response.next_cursor,
    };
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error('Notion client is not configured (NOTION_API_KEY missing)');
    }
    return this.client;
  }
}
