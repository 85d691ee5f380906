import type { ConversationService } from '../services/conversation.service';
import type { ConversationSearchService } from '../services/conversation-search.service';
import type { Indexer } from '../services/indexer.service';
import type { TurnResult } from '../interfaces/turn-result.interface';

export const SCENARIO_NAMES = ['basic', 'hitl', 'durability', 'search'] as const;
export type ScenarioName = (typeof SCENARIO_NAMES)[number];

export interface ScenarioContext {
  conversations: ConversationService;
  search: ConversationSearchService;
  indexer: Indexer;
  print: (line: string) => void;
}

export interface ScenarioOutcome {
  name: ScenarioName;
  passed: boolean;
  failures: string[];
}

type ScenarioFn = (
  ctx: ScenarioContext,
  check: (condition: boolean, message: string) => void,
) => Promise<void>;

function heading(ctx: ScenarioContext, title: string): void {
  ctx.print('');
  ctx.print('='.repeat(60));
  ctx.print(`SCENARIO: ${title}`);
  ctx.print('='.repeat(60));
}

function reply(result: TurnResult): string {
  return result.state.fields.finalReply ?? '(no reply)';
}

const basic: ScenarioFn = async (ctx, check) => {
  heading(ctx, 'Basic conversation');
  const userId = 'scenario-basic';

  ctx.print('Turn 1: asking about the return policy');
  const first = await ctx.conversations.runTurn(
    userId,
    "What's your return policy?",
  );
  ctx.print(`Agent: ${reply(first)}`);
  ctx.print(`Intent: ${first.state.fields.intent ?? 'none'}`);
  check(first.status === 'completed', 'first turn should complete');
  check(first.state.fields.intent === 'faq', "intent should be 'faq'");
  check(first.state.resolved === true, 'first turn should be resolved');

  ctx.print('Turn 2: follow-up in the same session');
  const second = await ctx.conversations.runTurn(
    userId,
    'How long do I have?',
    first.sessionId,
  );
  ctx.print(`Agent: ${reply(second)}`);
  ctx.print(`Messages: ${second.state.turns.length}`);
  check(second.status === 'completed', 'follow-up should complete');
  check(second.state.turns.length === 4, 'history should hold four records');
};

const hitl: ScenarioFn = async (ctx, check) => {
  heading(ctx, 'Human review (interrupt and resume)');
  const userId = 'scenario-hitl';

  ctx.print('Step 1: angry customer');
  const first = await ctx.conversations.runTurn(
    userId,
    "I'm extremely angry! Refund my order NOW!",
  );
  ctx.print(`Agent: ${reply(first)}`);
  ctx.print(`Awaiting review: ${first.state.awaitingExternalInput}`);
  check(first.status === 'interrupted', 'turn should pause for review');
  check(first.state.fields.intent === 'human', "intent should be 'human'");
  check(first.state.awaitingExternalInput, 'thread should await input');
  check(first.state.resolved !== true, 'paused thread is not resolved');

  ctx.print('Step 2: reviewer approves');
  const second = await ctx.conversations.runTurn(
    userId,
    'Approved: Issue full refund for order #12345',
    first.sessionId,
  );
  ctx.print(`Agent: ${reply(second)}`);
  ctx.print(`Resolved: ${second.state.resolved === true}`);
  check(second.status === 'completed', 'resumed turn should complete');
  check(second.state.resolved === true, 'resumed turn should be resolved');
  check(
    !second.state.awaitingExternalInput,
    'resumed thread no longer awaits input',
  );
};

const durability: ScenarioFn = async (ctx, check) => {
  heading(ctx, 'Durability (state survives between turns)');
  const userId = 'scenario-durability';

  ctx.print('Step 1: order question');
  const first = await ctx.conversations.runTurn(
    userId,
    'I need help with order #67890',
  );
  ctx.print(`Agent: ${reply(first)}`);
  ctx.print(`Order reference: ${first.state.fields.orderReference ?? 'none'}`);
  check(
    first.state.fields.orderReference === '67890',
    'order reference should be extracted',
  );

  ctx.print('Step 2: follow-up loaded from the checkpoint');
  const second = await ctx.conversations.runTurn(
    userId,
    'When will it arrive?',
    first.sessionId,
  );
  ctx.print(`Agent: ${reply(second)}`);
  ctx.print(
    `Order reference still available: ${second.state.fields.orderReference ?? 'none'}`,
  );
  check(
    second.state.fields.orderReference === '67890',
    'order reference lost between turns',
  );
};

const search: ScenarioFn = async (ctx, check) => {
  heading(ctx, 'Conversation search');
  const userId = 'scenario-search';

  ctx.print('Creating conversations');
  await ctx.conversations.runTurn(userId, 'I need a refund for my delayed order');
  await ctx.conversations.runTurn(userId, "What's your shipping policy?");
  await ctx.conversations.runTurn(userId, 'My package is damaged, need refund');

  if (!ctx.search.available) {
    ctx.print('Search index not configured, skipping queries');
    return;
  }

  await ctx.indexer.flush();
  const results = await ctx.search.search('refund', { userId }, 5);
  ctx.print(`Found ${results.length} result(s) for "refund"`);
  results.forEach((doc, i) => {
    ctx.print(
      `${i + 1}. Session ${doc.sessionId.slice(0, 8)} | intent=${doc.intent ?? 'none'} | resolved=${doc.resolved}`,
    );
  });
  check(results.length >= 1, 'search should find refund conversations');
};

const SCENARIOS: Record<ScenarioName, ScenarioFn> = {
  basic,
  hitl,
  durability,
  search,
};

export async function runScenario(
  name: ScenarioName,
  ctx: ScenarioContext,
): Promise<ScenarioOutcome> {
  const failures: string[] = [];
  const check = (condition: boolean, message: string): void => {
    if (!condition) failures.push(message);
  };

  try {
    await SCENARIOS[name](ctx, check);
  } catch (error) {
    failures.push(error instanceof Error ? error.message : String(error));
  }

  const passed = failures.length === 0;
  if (passed) {
    ctx.print(`PASSED: ${name}`);
  } else {
    for (const failure of failures) ctx.print(`FAILED: ${name}: ${failure}`);
  }
  return { name, passed, failures };
}

export async function runScenarios(
  names: readonly ScenarioName[],
  ctx: ScenarioContext,
): Promise<ScenarioOutcome[]> {
  const outcomes: ScenarioOutcome[] = [];
  for (const name of names) {
    outcomes.push(await runScenario(name, ctx));
  }
  return outcomes;
}
