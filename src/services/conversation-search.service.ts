import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type {
  ConversationStatistics,
  ISearchIndex,
  SearchDocument,
  SearchFilters,
} from '../interfaces/search-index.interface';
import { SEARCH_INDEX } from '../engine.constants';

export const DEFAULT_SEARCH_LIMIT = 10;

const EMPTY_STATISTICS: ConversationStatistics = {
  totalCount: 0,
  resolvedCount: 0,
  intentCounts: [],
};

/** Read side of the secondary index. Index problems yield empty results. */
@Injectable()
export class ConversationSearchService {
  private readonly logger = new Logger(ConversationSearchService.name);

  constructor(
    @Optional()
    @Inject(SEARCH_INDEX)
    private readonly index: ISearchIndex | null,
  ) {}

  get available(): boolean {
    return Boolean(this.index);
  }

  async search(
    query: string,
    filters: SearchFilters = {},
    limit = DEFAULT_SEARCH_LIMIT,
  ): Promise<SearchDocument[]> {
    if (!this.index) {
      this.logger.warn('Search unavailable: no search index configured');
      return [];
    }
    try {
      return await this.index.search(query, filters, limit);
    } catch (error) {
      this.logger.error(
        `Search failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return [];
    }
  }

  async statistics(userId: string): Promise<ConversationStatistics> {
    if (!this.index) {
      this.logger.warn('Statistics unavailable: no search index configured');
      return { ...EMPTY_STATISTICS, intentCounts: [] };
    }
    try {
      return await this.index.aggregate(userId);
    } catch (error) {
      this.logger.error(
        `Statistics query failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { ...EMPTY_STATISTICS, intentCounts: [] };
    }
  }
}
