import {
  ConflictException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { v5 as uuidv5 } from 'uuid';
import { OllamaService } from '../ollama/ollama.service';
import { NotionContentService } from '../notion/notion-content.service';
import {
  QDRANT_CLIENT,
  type ChunkHit,
  type ChunkPayload,
  type QdrantLike,
  type StoreNotionPageInput,
  type StorePageResult,
  type VectorStats,
} from './vectorstore.types';

const EMBED_BATCH_SIZE = 64;
const SCROLL_BATCH_SIZE = 256;
const CHUNK_ID_NAMESPACE = '3f6c1e9a-52d4-5b8e-9c07-a1d2e3f40b61';

// Stable per (page, chunk) so a re-sync overwrites instead of adding points
export function chunkPointId(pageId: string, chunkIndex: number): string {
  return uuidv5(`${pageId}:${chunkIndex}`, CHUNK_ID_NAMESPACE);
}

function pageFilter(pageId: string) {
  return { must: [{ key: 'page_id', match: { value: pageId } }] };
}

function pointOffset(value: unknown): string | number | undefined {
  return typeof value === 'string' || typeof value === 'number'
    ? value
    : undefined;
}

function toChunkPayload(
  payload: Record<string, unknown> | null | undefined,
): ChunkPayload | null {
  if (!payload) return null;
  const {
    page_id,
    database_id,
    page_title,
    page_url,
    chunk_index,
    text,
    last_edited_time,
    stored_at,
  } = payload;
  if (typeof page_id !== 'string' || typeof text !== 'string') return null;
  return {
    page_id,
    text,
    database_id: typeof database_id === 'string' ? database_id : '',
    page_title: typeof page_title === 'string' ? page_title : '',
    page_url: typeof page_url === 'string' ? page_url : '',
    chunk_index: typeof chunk_index === 'number' ? chunk_index : 0,
    last_edited_time:
      typeof last_edited_time === 'string' ? last_edited_time : '',
    stored_at: typeof stored_at === 'string' ? stored_at : '',
  };
}

@Injectable()
export class VectorstoreService {
  private readonly logger = new Logger(VectorstoreService.name);
  private readonly collection: string;
  private readonly splitter: RecursiveCharacterTextSplitter;

  constructor(
    private readonly config: ConfigService,
    private readonly ollama: OllamaService,
    private readonly content: NotionContentService,
    @Inject(QDRANT_CLIENT) private readonly client: QdrantLike,
  ) {
    this.collection =
      this.config.get<string>('QDRANT_COLLECTION') ?? 'notion_pages';
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: Number(this.config.get('CHUNK_SIZE') ?? 1000),
      chunkOverlap: Number(this.config.get('CHUNK_OVERLAP') ?? 150),
    });
  }

  get embeddingModelName(): string {
    return this.ollama.embedModel;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [vector] = await this.ollama.embed([text]);
    if (!vector) throw new Error('Embedding model returned no vector');
    return vector;
  }

  /** Creates the collection and its payload indexes when missing. */
  async ensureVectorIndex(): Promise<void> {
    const dim = (await this.generateEmbedding('dimension check')).length;

    const collections = await this.client.getCollections();
    const exists = collections.collections.some(
      (c) => c.name === this.collection,
    );

    if (exists) {
      const info = await this.client.getCollection(this.collection);
      const vectors = info.config?.params?.vectors;
      const existingDim =
        typeof vectors === 'object' &&
        vectors !== null &&
        'size' in vectors &&
        typeof vectors.size === 'number'
          ? vectors.size
          : undefined;

      if (existingDim !== undefined && existingDim !== dim) {
        throw new ConflictException(
          `Dimension mismatch on collection "${this.collection}": ` +
            `existing=${existingDim}, model=${dim}. ` +
            `Drop the collection to recreate it.`,
        );
      }
    } else {
      await this.client.createCollection(this.collection, {
        vectors: { size: dim, distance: 'Cosine' },
      });
      this.logger.log(`Collection "${this.collection}" created (dim=${dim})`);
    }

    for (const field of ['page_id', 'database_id']) {
      await this.client.createPayloadIndex(this.collection, {
        field_name: field,
        field_schema: 'keyword',
        wait: true,
      });
    }
  }

  async getStats(): Promise<VectorStats> {
    const { count } = await this.client.count(this.collection, { exact: true });

    const pageIds = new Set<string>();
    let offset: string | number | undefined;
    do {
      const batch = await this.client.scroll(this.collection, {
        limit: SCROLL_BATCH_SIZE,
        with_payload: ['page_id'],
        with_vector: false,
        ...(offset !== undefined ? { offset } : {}),
      });
      for (const point of batch.points) {
        const pageId = point.payload?.page_id;
        if (typeof pageId === 'string') pageIds.add(pageId);
      }
      offset = pointOffset(batch.next_page_offset);
    } while (offset !== undefined);

    return {
      collection: this.collection,
      total_chunks: count,
      unique_pages: pageIds.size,
      embedding_model: this.embeddingModelName,
    };
  }

  /**
   * Replaces the stored chunks of a page. Unless `forceUpdate` is set, a page
   * whose `last_edited_time` matches the stored one is left untouched.
   */
  async storeNotionPage({
    pageId,
    page,
    databaseId,
    forceUpdate,
  }: StoreNotionPageInput): Promise<StorePageResult> {
    if (!forceUpdate) {
      const storedEdit = await this.storedEditTime(pageId);
      if (storedEdit !== undefined && storedEdit === page.last_edited_time) {
        return { status: 'skipped', page_id: pageId, reason: 'unchanged' };
      }
    }

    const body = page.content.filter((line) => line.trim().length > 0).join('\n');
    if (!body) {
      return { status: 'skipped', page_id: pageId, reason: 'empty' };
    }

    const title = this.content.pageTitle(page);
    const chunks = await this.splitter.splitText(`${title}\n\n${body}`);

    const vectors: number[][] = [];
    for (let i = 0; i < chunks.length; i += EMBED_BATCH_SIZE) {
      vectors.push(...(await this.ollama.embed(chunks.slice(i, i + EMBED_BATCH_SIZE))));
    }
    if (vectors.length !== chunks.length) {
      throw new Error(
        `Expected ${chunks.length} embeddings for page ${pageId}, got ${vectors.length}`,
      );
    }

    const storedAt = new Date().toISOString();
    await this.client.upsert(this.collection, {
      wait: true,
      points: chunks.map((text, i) => ({
        id: chunkPointId(pageId, i),
        vector: vectors[i],
        payload: {
          page_id: pageId,
          database_id: databaseId,
          page_title: title,
          page_url: page.url,
          chunk_index: i,
          text,
          last_edited_time: page.last_edited_time,
          stored_at: storedAt,
        } satisfies ChunkPayload,
      })),
    });

    // Chunks past the new end are left over from a longer previous version
    await this.client.delete(this.collection, {
      wait: true,
      filter: {
        must: [
          ...pageFilter(pageId).must,
          { key: 'chunk_index', range: { gte: chunks.length } },
        ],
      },
    });

    this.logger.debug(`Stored ${chunks.length} chunks for page ${pageId}`);
    return { status: 'success', page_id: pageId, chunks_stored: chunks.length };
  }

  async search(
    queryVector: number[],
    limit: number,
    scoreThreshold?: number,
  ): Promise<ChunkHit[]> {
    const hits = await this.client.search(this.collection, {
      vector: queryVector,
      limit,
      with_payload: true,
      with_vector: false,
      ...(scoreThreshold !== undefined ? { score_threshold: scoreThreshold } : {}),
    });

    return hits.flatMap((hit) => {
      const payload = toChunkPayload(hit.payload);
      return payload ? [{ score: hit.score, payload }] : [];
    });
  }

  private async storedEditTime(pageId: string): Promise<string | undefined> {
    const { points } = await this.client.scroll(this.collection, {
      filter: pageFilter(pageId),
      limit: 1,
      with_payload: ['last_edited_time'],
      with_vector: false,
    });
    const value = points[0]?.payload?.last_edited_time;
    return typeof value === 'string' ? value : undefined;
  }
}
