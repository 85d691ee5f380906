import type {
  ConversationStatistics,
  ISearchIndex,
  SearchDocument,
  SearchFilters,
} from '../interfaces/search-index.interface';

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

function cloneDocument(document: SearchDocument): SearchDocument {
  const copy: SearchDocument = JSON.parse(JSON.stringify(document));
  return copy;
}

/**
 * Process-local search index with the same query semantics as the
 * Elasticsearch index: every query term must appear in `messages`, filters
 * are exact, results are newest first.
 */
export class InMemorySearchIndex implements ISearchIndex {
  private readonly documents = new Map<string, SearchDocument>();

  async setup(): Promise<void> {
    // nothing to create
  }

  async upsert(id: string, document: SearchDocument): Promise<void> {
    this.documents.set(id, cloneDocument(document));
  }

  async search(
    query: string,
    filters: SearchFilters,
    limit: number,
  ): Promise<SearchDocument[]> {
    const terms = tokenize(query);

    return Array.from(this.documents.values())
      .filter((document) => {
        if (filters.userId && document.userId !== filters.userId) return false;
        if (filters.intent && document.intent !== filters.intent) return false;
        if (
          filters.resolved !== undefined &&
          document.resolved !== filters.resolved
        ) {
          return false;
        }
        const words = new Set(tokenize(document.messages));
        return terms.every((term) => words.has(term));
      })
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
      .slice(0, limit)
      .map(cloneDocument);
  }

  async aggregate(userId: string): Promise<ConversationStatistics> {
    const counts = new Map<string, number>();
    let totalCount = 0;
    let resolvedCount = 0;

    for (const document of this.documents.values()) {
      if (document.userId !== userId) continue;
      totalCount++;
      if (document.resolved) resolvedCount++;
      if (document.intent) {
        counts.set(document.intent, (counts.get(document.intent) ?? 0) + 1);
      }
    }

    const intentCounts = Array.from(counts.entries())
      .map(([intent, count]) => ({ intent, count }))
      .sort((a, b) => b.count - a.count || a.intent.localeCompare(b.intent));

    return { totalCount, resolvedCount, intentCounts };
  }

  async close(): Promise<void> {
    this.documents.clear();
  }
}
