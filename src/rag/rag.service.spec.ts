import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { OllamaService } from '../ollama/ollama.service';
import { VectorstoreService } from '../vectorstore/vectorstore.service';
import type { ChunkHit } from '../vectorstore/vectorstore.types';
import { RagService } from './rag.service';

const hit = (
  pageId: string,
  score: number,
  pageUrl = `https://www.notion.so/${pageId}`,
): ChunkHit => ({
  score,
  payload: {
    page_id: pageId,
    database_id: 'db-a',
    page_title: `Title of ${pageId}`,
    page_url: pageUrl,
    chunk_index: 0,
    text: `Text of ${pageId}`,
    last_edited_time: '2026-01-01T00:00:00.000Z',
    stored_at: '2026-01-02T00:00:00.000Z',
  },
});

describe('RagService', () => {
  let service: RagService;
  let vs: { generateEmbedding: jest.Mock; search: jest.Mock };
  let ollama: { generate: jest.Mock; llmModel: string };

  beforeEach(async () => {
    vs = {
      generateEmbedding: jest.fn().mockResolvedValue([0.4, 0.5]),
      search: jest.fn().mockResolvedValue([]),
    };
    ollama = {
      generate: jest.fn().mockResolvedValue('The answer.'),
      llmModel: 'mistral:latest',
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        RagService,
        { provide: ConfigService, useValue: new ConfigService({}) },
        { provide: OllamaService, useValue: ollama },
        { provide: VectorstoreService, useValue: vs },
      ],
    }).compile();

    service = moduleRef.get(RagService);
  });

  it('exposes the generation model', () => {
    expect(service.modelName).toBe('mistral:latest');
  });

  it('answers from retrieved context', async () => {
    vs.search.mockResolvedValue([hit('page-1', 0.9), hit('page-2', 0.8), hit('page-1', 0.7)]);

    const answer = await service.answerQuestion('What are the Q3 goals?');

    expect(vs.generateEmbedding).toHaveBeenCalledWith('What are the Q3 goals?');
    expect(vs.search).toHaveBeenCalledWith([0.4, 0.5], 5, 0.3);
    expect(answer).toEqual({
      answer: 'The answer.',
      context_used: true,
      model_used: 'mistral:latest',
      sources: [
        {
          page_id: 'page-1',
          page_title: 'Title of page-1',
          page_url: 'https://www.notion.so/page-1',
          score: 0.9,
        },
        {
          page_id: 'page-2',
          page_title: 'Title of page-2',
          page_url: 'https://www.notion.so/page-2',
          score: 0.8,
        },
      ],
    });

    const [prompt, system] = ollama.generate.mock.calls[0];
    expect(prompt).toBe(
      'Context:\n' +
        '# Excerpt 1 (page: Title of page-1, chunk: 0)\nText of page-1\n\n' +
        '# Excerpt 2 (page: Title of page-2, chunk: 0)\nText of page-2\n\n' +
        '# Excerpt 3 (page: Title of page-1, chunk: 0)\nText of page-1\n\n' +
        'Question:\nWhat are the Q3 goals?\n\nAnswer:',
    );
    expect(system).toContain('Notion knowledge base');
  });

  it('answers without context when nothing matches', async () => {
    const answer = await service.answerQuestion('Unrelated?');

    expect(answer.context_used).toBe(false);
    expect(answer.sources).toEqual([]);
    expect(ollama.generate.mock.calls[0][0]).toBe(
      'Question:\nUnrelated?\n\nNo relevant context was found in the knowledge base. Answer:',
    );
  });

  it('uses the requested number of chunks', async () => {
    await service.answerQuestion('Q?', 2);

    expect(vs.search).toHaveBeenCalledWith([0.4, 0.5], 2, 0.3);
  });
});
