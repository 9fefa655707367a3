import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaService } from '../ollama/ollama.service';
import { VectorstoreService } from '../vectorstore/vectorstore.service';
import type { ChunkHit } from '../vectorstore/vectorstore.types';
import type { RagAnswer, RagSource } from './rag.types';

const SYSTEM_PROMPT = `You are an assistant answering questions about the team's Notion knowledge base.
Use the provided context first.
If the context does not contain the answer, say so explicitly.`;

@Injectable()
export class RagService {
  private readonly logger = new Logger(RagService.name);
  private readonly defaultTopK: number;
  private readonly scoreThreshold: number;

  constructor(
    private readonly config: ConfigService,
    private readonly ollama: OllamaService,
    private readonly vs: VectorstoreService,
  ) {
    this.defaultTopK = Number(this.config.get('RAG_TOP_K') ?? 5);
    this.scoreThreshold = Number(this.config.get('RAG_SCORE_THRESHOLD') ?? 0.3);
  }

  get modelName(): string {
    return this.ollama.llmModel;
  }

  async answerQuestion(question: string, topK?: number): Promise<RagAnswer> {
    const k = topK ?? this.defaultTopK;
    const queryVector = await this.vs.generateEmbedding(question);
    const hits = await this.vs.search(queryVector, k, this.scoreThreshold);
    this.logger.debug(`${hits.length} chunks retrieved for "${question.slice(0, 60)}"`);

    const prompt =
      hits.length > 0
        ? `Context:\n${this.formatContext(hits)}\n\nQuestion:\n${question}\n\nAnswer:`
        : `Question:\n${question}\n\nNo relevant context was found in the knowledge base. Answer:`;
    const answer = await this.ollama.generate(prompt, SYSTEM_PROMPT);

    return {
      answer,
      context_used: hits.length > 0,
      sources: this.collectSources(hits),
      model_used: this.modelName,
    };
  }

  private formatContext(hits: ChunkHit[]): string {
    return hits
      .map(
        ({ payload }, idx) =>
          `# Excerpt ${idx + 1} (page: ${payload.page_title}, chunk: ${payload.chunk_index})\n${payload.text}`,
      )
      .join('\n\n');
  }

  /** One source per page, keeping its best-scoring chunk, best first. */
  private collectSources(hits: ChunkHit[]): RagSource[] {
    const byPage = new Map<string, RagSource>();
    for (const { score, payload } of hits) {
      const existing = byPage.get(payload.page_id);
      if (existing && existing.score >= score) continue;
      byPage.set(payload.page_id, {
        page_id: payload.page_id,
        page_title: payload.page_title,
        page_url: payload.page_url,
        score,
      });
    }
    return [...byPage.values()].sort((a, b) => b.score - a.score);
  }
}
