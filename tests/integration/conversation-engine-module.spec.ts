import { Test, TestingModule } from '@nestjs/testing';
import { Injectable } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ConversationEngineModule } from '../../src/conversation-engine.module';
import { InMemorySearchIndex } from '../../src/adapters/in-memory-search-index.adapter';
import { InMemoryStateStore } from '../../src/adapters/in-memory-state-store.adapter';
import { CustomerServiceGraph } from '../../src/customer-service/customer-service.graph';
import {
  PassthroughReplyPolisher,
  REPLY_POLISHER,
} from '../../src/customer-service/reply-polisher';
import { DurableGraph } from '../../src/decorators/durable-graph.decorator';
import type { GraphProvider } from '../../src/interfaces/graph-definition.interface';
import { ConversationSearchService } from '../../src/services/conversation-search.service';
import { ConversationService } from '../../src/services/conversation.service';
import { GraphRegistry } from '../../src/services/graph-registry.service';
import { INDEX_RETRY_JOB_NAME } from '../../src/services/index-retry-cron.service';
import { Indexer } from '../../src/services/indexer.service';
import { SEARCH_INDEX, STATE_STORE } from '../../src/engine.constants';
import { createMockStore } from '../helpers';

@DurableGraph()
@Injectable()
class EchoGraph implements GraphProvider {
  define() {
    return {
      start: 'echo',
      nodes: {
        echo: () => ({ finalReply: 'echo' }),
      },
    };
  }
}

const polisherProvider = {
  provide: REPLY_POLISHER,
  useValue: new PassthroughReplyPolisher(),
};

describe('ConversationEngineModule integration', () => {
  let module: TestingModule | undefined;

  afterEach(async () => {
    if (module) {
      await module.close();
      module = undefined;
    }
  });

  it('should bootstrap with forRoot and discover decorated graphs', async () => {
    module = await Test.createTestingModule({
      imports: [
        ConversationEngineModule.forRoot({ store: new InMemoryStateStore() }),
      ],
      providers: [CustomerServiceGraph, EchoGraph, polisherProvider],
    }).compile();

    await module.init();

    const registry = module.get(GraphRegistry);
    expect(registry.get('customer_service')?.source).toBe('CustomerServiceGraph');
    expect(registry.get('echo')?.source).toBe('EchoGraph');
  });

  it('should run turns through the injected service', async () => {
    module = await Test.createTestingModule({
      imports: [
        ConversationEngineModule.forRoot({
          store: new InMemoryStateStore(),
          defaultGraphId: 'customer_service',
        }),
      ],
      providers: [CustomerServiceGraph, polisherProvider],
    }).compile();
    await module.init();

    const service = module.get(ConversationService);
    const result = await service.runTurn('u1', 'Do you take payment by PayPal?');

    expect(result.status).toBe('completed');
    expect(result.state.fields.finalReply).toBe(
      'We accept all major credit cards, PayPal, and Apple Pay.',
    );
  });

  it('should set up and close the state store with the module', async () => {
    const store = createMockStore();
    const standalone = await Test.createTestingModule({
      imports: [ConversationEngineModule.forRoot({ store })],
    }).compile();

    await standalone.init();
    expect(store.setup).toHaveBeenCalledTimes(1);

    await standalone.close();
    expect(store.close).toHaveBeenCalledTimes(1);
  });

  it('should run without search when no index is given', async () => {
    module = await Test.createTestingModule({
      imports: [
        ConversationEngineModule.forRoot({ store: new InMemoryStateStore() }),
      ],
    }).compile();
    await module.init();

    expect(module.get(SEARCH_INDEX)).toBeNull();
    expect(module.get(ConversationSearchService).available).toBe(false);
    expect(module.get(Indexer).enabled).toBe(false);
    expect(
      module.get(SchedulerRegistry).doesExist('cron', INDEX_RETRY_JOB_NAME),
    ).toBe(false);
  });

  it('should bootstrap with forRootAsync', async () => {
    const store = new InMemoryStateStore();
    const factory = jest.fn().mockResolvedValue({
      store,
      searchIndex: new InMemorySearchIndex(),
      maxSteps: 10,
    });

    module = await Test.createTestingModule({
      imports: [ConversationEngineModule.forRootAsync({ useFactory: factory })],
      providers: [EchoGraph],
    }).compile();
    await module.init();

    expect(factory).toHaveBeenCalledTimes(1);
    expect(module.get(STATE_STORE)).toBe(store);
    expect(module.get(ConversationSearchService).available).toBe(true);
    expect(
      module.get(SchedulerRegistry).doesExist('cron', INDEX_RETRY_JOB_NAME),
    ).toBe(true);

    const result = await module.get(ConversationService).runTurn('u1', 'hi');
    expect(result.state.fields.finalReply).toBe('echo');
  });
});
