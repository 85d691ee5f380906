import { Logger } from '@nestjs/common';
import type { Client, estypes } from '@elastic/elasticsearch';
import type {
  ConversationStatistics,
  ISearchIndex,
  SearchDocument,
  SearchFilters,
} from '../interfaces/search-index.interface';

interface ConversationAggregations {
  total_conversations: estypes.AggregationsValueCountAggregate;
  resolved_count: estypes.AggregationsFilterAggregate;
  intents: estypes.AggregationsStringTermsAggregate;
}

export const CONVERSATION_INDEX_MAPPINGS: estypes.MappingTypeMapping = {
  properties: {
    threadId: { type: 'keyword' },
    sessionId: { type: 'keyword' },
    userId: { type: 'keyword' },
    intent: { type: 'keyword' },
    orderReference: { type: 'keyword' },
    resolved: { type: 'boolean' },
    awaitingExternalInput: { type: 'boolean' },
    messages: { type: 'text', analyzer: 'standard' },
    turns: { type: 'object', enabled: false },
    traceId: { type: 'keyword' },
    updatedAt: { type: 'date' },
  },
};

export class ElasticsearchSearchIndex implements ISearchIndex {
  private readonly logger = new Logger(ElasticsearchSearchIndex.name);

  constructor(
    private readonly client: Client,
    private readonly indexName: string,
  ) {}

  async setup(): Promise<void> {
    const info = await this.client.info();
    this.logger.log(`Elasticsearch connected: ${info.version.number}`);

    const exists = await this.client.indices.exists({ index: this.indexName });
    if (exists) {
      this.logger.log(`Index '${this.indexName}' already exists`);
      return;
    }

    await this.client.indices.create({
      index: this.indexName,
      mappings: CONVERSATION_INDEX_MAPPINGS,
    });
    this.logger.log(`Created Elasticsearch index: ${this.indexName}`);
  }

  async upsert(id: string, document: SearchDocument): Promise<void> {
    await this.client.index({
      index: this.indexName,
      id,
      document,
      refresh: 'wait_for',
    });
  }

  async search(
    query: string,
    filters: SearchFilters,
    limit: number,
  ): Promise<SearchDocument[]> {
    const must: estypes.QueryDslQueryContainer[] = query.trim()
      ? [{ match: { messages: { query, operator: 'and' } } }]
      : [{ match_all: {} }];

    const filter: estypes.QueryDslQueryContainer[] = [];
    if (filters.userId) filter.push({ term: { userId: filters.userId } });
    if (filters.intent) filter.push({ term: { intent: filters.intent } });
    if (filters.resolved !== undefined) {
      filter.push({ term: { resolved: filters.resolved } });
    }

    const response = await this.client.search<SearchDocument>({
      index: this.indexName,
      query: { bool: { must, filter } },
      size: limit,
      sort: [{ updatedAt: { order: 'desc' } }],
    });

    const documents: SearchDocument[] = [];
    for (const hit of response.hits.hits) {
      if (hit._source) documents.push(hit._source);
    }
    return documents;
  }

  async aggregate(userId: string): Promise<ConversationStatistics> {
    const response = await this.client.search<
      SearchDocument,
      ConversationAggregations
    >({
      index: this.indexName,
      query: { term: { userId } },
      size: 0,
      aggs: {
        total_conversations: { value_count: { field: 'threadId' } },
        resolved_count: { filter: { term: { resolved: true } } },
        intents: { terms: { field: 'intent' } },
      },
    });

    const aggregations = response.aggregations;
    if (!aggregations) {
      return { totalCount: 0, resolvedCount: 0, intentCounts: [] };
    }

    const buckets = aggregations.intents.buckets;
    const bucketList = Array.isArray(buckets)
      ? buckets
      : Object.values(buckets);

    return {
      totalCount: aggregations.total_conversations.value ?? 0,
      resolvedCount: aggregations.resolved_count.doc_count,
      intentCounts: bucketList.map((bucket) => ({
        intent: String(bucket.key),
        count: bucket.doc_count,
      })),
    };
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
