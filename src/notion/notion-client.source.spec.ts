import { ConfigService } from '@nestjs/config';
import { Client } from '@notionhq/client';
import { NotionClientSource } from './notion-client.source';
import { notionPage, paragraph } from '../../test/fixtures/notion';

const mockQuery = jest.fn();
const mockListChildren = jest.fn();

jest.mock('@notionhq/client', () => ({
  Client: jest.fn().mockImplementation(() => ({
    databases: { query: mockQuery },
    blocks: { children: { list: mockListChildren } },
  })),
}));

describe('NotionClientSource', () => {
  const source = (env: Record<string, string> = { NOTION_API_KEY: 'test-secret' }) =>
    new NotionClientSource(new ConfigService(env));

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('authenticates the SDK client with the configured key', () => {
    expect(source().configured).toBe(true);
    expect(Client).toHaveBeenCalledWith({ auth: 'test-secret' });
  });

  describe('queryDatabase', () => {
    it('keeps full pages and maps the cursor', async () => {
      const full = notionPage('page-1');
      mockQuery.mockResolvedValue({
        object: 'list',
        results: [full, { object: 'page', id: 'page-2' }, { object: 'database', id: 'db-x' }],
        has_more: true,
        next_cursor: 'cursor-2',
      });

      const list = await source().queryDatabase({ databaseId: 'db-a', pageSize: 10 });

      expect(mockQuery).toHaveBeenCalledWith({ database_id: 'db-a', page_size: 10 });
      expect(list).toEqual({ results: [full], hasMore: true, nextCursor: 'cursor-2' });
    });

    it('sends the start cursor when one is given', async () => {
      mockQuery.mockResolvedValue({ results: [], has_more: false, next_cursor: null });

      const list = await source().queryDatabase({
        databaseId: 'db-a',
        pageSize: 100,
        startCursor: 'cursor-2',
      });

      expect(mockQuery).toHaveBeenCalledWith({
        database_id: 'db-a',
        page_size: 100,
        start_cursor: 'cursor-2',
      });
      expect(list).toEqual({ results: [], hasMore: false, nextCursor: null });
    });
  });

  describe('listBlockChildren', () => {
    it('drops partial blocks', async () => {
      const full = paragraph('Hello');
      mockListChildren.mockResolvedValue({
        results: [full, { object: 'block', id: 'partial' }],
        has_more: false,
        next_cursor: null,
      });

      const list = await source().listBlockChildren('page-1');

      expect(mockListChildren).toHaveBeenCalledWith({ block_id: 'page-1', page_size: 100 });
      expect(list).toEqual({ results: [full], hasMore: false, nextCursor: null });
    });

    it('follows a block cursor', async () => {
      mockListChildren.mockResolvedValue({ results: [], has_more: true, next_cursor: 'b-3' });

      const list = await source().listBlockChildren('page-1', 'b-2');

      expect(mockListChildren).toHaveBeenCalledWith({
        block_id: 'page-1',
        page_size: 100,
        start_cursor: 'b-2',
      });
      expect(list.nextCursor).toBe('b-3');
      expect(list.hasMore).toBe(true);
    });
  });

  describe('without NOTION_API_KEY', () => {
    it('reports itself unconfigured and refuses calls', async () => {
      const unconfigured = source({});

      expect(unconfigured.configured).toBe(false);
      expect(Client).not.toHaveBeenCalled();
      await expect(
        unconfigured.queryDatabase({ databaseId: 'db-a', pageSize: 10 }),
      ).rejects.toThrow('Notion client is not configured (NOTION_API_KEY missing)');
      await expect(unconfigured.listBlockChildren('page-1')).rejects.toThrow(
        'Notion client is not configured (NOTION_API_KEY missing)',
      );
      expect(mockQuery).not.toHaveBeenCalled();
    });
  });
});
