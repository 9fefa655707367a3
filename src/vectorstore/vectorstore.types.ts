import type { QdrantClient } from '@qdrant/js-client-rest';
import type { NotionPageDocument } from '../notion/notion.types';

export type ChunkPayload = {
  page_id: string;
  database_id: string;
  page_title: string;
  page_url: string;
  chunk_index: number;
  text: string;
  last_edited_time: string;
  stored_at: string; // ISO 8601
};

export type StoreNotionPageInput = {
  pageId: string;
  page: NotionPageDocument;
  databaseId: string;
  forceUpdate: boolean;
};

export type StorePageResult =
  | { status: 'success'; page_id: string; chunks_stored: number }
  | { status: 'skipped'; page_id: string; reason: 'unchanged' | 'empty' };

export type VectorStats = {
  collection: string;
  total_chunks: number;
  unique_pages: number;
  embedding_model: string;
};

export type ChunkHit = {
  score: number;
  payload: ChunkPayload;
};

export type QdrantLike = Pick<
  QdrantClient,
  | 'getCollections'
  | 'getCollection'
  | 'createCollection'
  | 'createPayloadIndex'
  | 'upsert'
  | 'delete'
  | 'scroll'
  | 'count'
  | 'search'
>;

export const QDRANT_CLIENT = Symbol('QDRANT_CLIENT');
