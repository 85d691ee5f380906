import { InMemorySearchIndex } from '../../src/adapters/in-memory-search-index.adapter';
import {
  runScenario,
  runScenarios,
  SCENARIO_NAMES,
  type ScenarioContext,
} from '../../src/cli/scenarios';
import { ConversationSearchService } from '../../src/services/conversation-search.service';
import { createEngineHarness } from '../helpers';

function createContext(withSearch: boolean) {
  const searchIndex = withSearch ? new InMemorySearchIndex() : null;
  const { service, indexer } = createEngineHarness({ searchIndex });
  const lines: string[] = [];
  const ctx: ScenarioContext = {
    conversations: service,
    search: new ConversationSearchService(searchIndex),
    indexer,
    print: (line) => lines.push(line),
  };
  return { ctx, lines };
}

describe('demo scenarios', () => {
  it('should pass every scenario against the in-memory stack', async () => {
    const { ctx } = createContext(true);

    const outcomes = await runScenarios(SCENARIO_NAMES, ctx);

    expect(outcomes).toEqual([
      { name: 'basic', passed: true, failures: [] },
      { name: 'hitl', passed: true, failures: [] },
      { name: 'durability', passed: true, failures: [] },
      { name: 'search', passed: true, failures: [] },
    ]);
  });

  it('should report how many conversations the search found', async () => {
    const { ctx, lines } = createContext(true);

    await runScenario('search', ctx);

    expect(lines).toContain('Found 2 result(s) for "refund"');
    expect(lines[lines.length - 1]).toBe('PASSED: search');
  });

  it('should skip search queries without an index', async () => {
    const { ctx, lines } = createContext(false);

    const outcome = await runScenario('search', ctx);

    expect(outcome.passed).toBe(true);
    expect(lines).toContain('Search index not configured, skipping queries');
  });

  it('should record a thrown error as a failure', async () => {
    const { ctx, lines } = createContext(false);
    jest
      .spyOn(ctx.conversations, 'runTurn')
      .mockRejectedValueOnce(new Error('store offline'));

    const outcome = await runScenario('basic', ctx);

    expect(outcome).toEqual({
      name: 'basic',
      passed: false,
      failures: ['store offline'],
    });
    expect(lines[lines.length - 1]).toBe('FAILED: basic: store offline');
  });
});
