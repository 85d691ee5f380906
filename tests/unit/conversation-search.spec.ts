import { ConversationSearchService } from '../../src/services/conversation-search.service';
import type { SearchDocument } from '../../src/interfaces/search-index.interface';
import { createMockSearchIndex } from '../helpers';

const hit: SearchDocument = {
  threadId: 'u1:s1',
  sessionId: 's1',
  userId: 'u1',
  intent: 'faq',
  orderReference: null,
  resolved: true,
  awaitingExternalInput: false,
  messages: 'return policy',
  turns: [],
  traceId: 'trace001',
  updatedAt: '2024-01-01T00:00:00.000Z',
};

describe('ConversationSearchService', () => {
  it('should forward queries with a default limit of 10', async () => {
    const index = createMockSearchIndex();
    index.search.mockResolvedValueOnce([hit]);
    const service = new ConversationSearchService(index);

    expect(await service.search('return', { userId: 'u1' })).toEqual([hit]);
    expect(index.search).toHaveBeenCalledWith('return', { userId: 'u1' }, 10);
  });

  it('should return no results when the index fails', async () => {
    const index = createMockSearchIndex();
    index.search.mockRejectedValueOnce(new Error('index_not_found_exception'));
    const service = new ConversationSearchService(index);

    expect(await service.search('return')).toEqual([]);
  });

  it('should return statistics from the index', async () => {
    const index = createMockSearchIndex();
    index.aggregate.mockResolvedValueOnce({
      totalCount: 4,
      resolvedCount: 3,
      intentCounts: [{ intent: 'faq', count: 4 }],
    });
    const service = new ConversationSearchService(index);

    expect(await service.statistics('u1')).toEqual({
      totalCount: 4,
      resolvedCount: 3,
      intentCounts: [{ intent: 'faq', count: 4 }],
    });
  });

  it('should return zero statistics when the index fails', async () => {
    const index = createMockSearchIndex();
    index.aggregate.mockRejectedValueOnce(new Error('timeout'));
    const service = new ConversationSearchService(index);

    expect(await service.statistics('u1')).toEqual({
      totalCount: 0,
      resolvedCount: 0,
      intentCounts: [],
    });
  });

  it('should degrade to empty results without an index', async () => {
    const service = new ConversationSearchService(null);

    expect(service.available).toBe(false);
    expect(await service.search('anything')).toEqual([]);
    expect((await service.statistics('u1')).totalCount).toBe(0);
  });
});
