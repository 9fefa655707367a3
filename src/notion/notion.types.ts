export type NotionProperty = {
  id: string;
  type: string;
  [key: string]: unknown;
};

export type NotionPageObject = {
  object: 'page';
  id: string;
  url: string;
  last_edited_time: string;
  properties: Record<string, NotionProperty>;
};

/** A database page with the normalized text of its top-level blocks appended. */
export type NotionPageDocument = NotionPageObject & {
  content: string[];
};

export type NotionBlock = {
  object: 'block';
  id: string;
  type: string;
  has_children: boolean;
  [key: string]: unknown;
};

export type NotionList<T> = {
  results: T[];
  hasMore: boolean;
  nextCursor: string | null;
};

export type DatabaseQuery = {
  databaseId: string;
  pageSize: number;
  startCursor?: string;
};

/**
 * The subset of the Notion API the sync needs. Implemented by
 * `NotionClientSource`; tests provide in-memory fakes.
 */
export interface NotionDocumentSource {
  readonly configured: boolean;
  queryDatabase(query: DatabaseQuery): Promise<NotionList<NotionPageObject>>;
  listBlockChildren(
    blockId: string,
    startCursor?: string,
  ): Promise<NotionList<NotionBlock>>;
}

export const NOTION_SOURCE = Symbol('NOTION_SOURCE');
