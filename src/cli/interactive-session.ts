import type { ConversationService } from '../services/conversation.service';
import type { ConversationSearchService } from '../services/conversation-search.service';

export const DEFAULT_USER_ID = 'demo-user';

export const HELP_TEXT = [
  'Commands:',
  '  /new                 - Start a new conversation',
  '  /resume <sessionId>  - Continue an earlier conversation',
  '  /search              - Search your conversations',
  '  /stats               - View your statistics',
  '  /help                - Show this help',
  '  /quit                - Exit',
];

export interface SessionIo {
  ask(question: string): Promise<string>;
  print(line: string): void;
}

/** One user's shell over the conversation service. */
export class InteractiveSession {
  private sessionId: string | undefined;

  constructor(
    private readonly userId: string,
    private readonly conversations: ConversationService,
    private readonly search: ConversationSearchService,
    private readonly io: SessionIo,
  ) {}

  get currentSessionId(): string | undefined {
    return this.sessionId;
  }

  /** Returns false once the user asked to quit. */
  async handle(rawInput: string): Promise<boolean> {
    const input = rawInput.trim();
    if (!input) return true;

    if (input.startsWith('/')) {
      return this.command(input);
    }

    const result = await this.conversations.runTurn(
      this.userId,
      input,
      this.sessionId,
    );
    this.sessionId = result.sessionId;

    const intent = result.state.fields.intent ?? 'unknown';
    this.io.print('');
    this.io.print(
      `[Agent (${intent})] ${result.state.fields.finalReply ?? 'No response'}`,
    );
    if (result.status === 'interrupted') {
      this.io.print('Conversation paused: awaiting human review');
      this.io.print(`Session ID: ${result.sessionId}`);
    }
    if (result.status === 'failed') {
      this.io.print(`(turn failed: ${result.error.kind})`);
    }
    this.io.print(
      `Messages: ${result.state.turns.length} | Session: ${result.sessionId.slice(0, 8)}...`,
    );
    this.io.print('');
    return true;
  }

  private async command(input: string): Promise<boolean> {
    const [name, ...rest] = input.split(/\s+/);

    switch (name) {
      case '/quit':
        this.io.print('Goodbye!');
        return false;
      case '/new':
        this.sessionId = undefined;
        this.io.print('Started new conversation');
        return true;
      case '/resume': {
        const target = rest[0];
        if (!target) {
          this.io.print('Usage: /resume <sessionId>');
          return true;
        }
        this.sessionId = target;
        this.io.print(`Resuming session ${target}`);
        return true;
      }
      case '/search':
        await this.runSearch();
        return true;
      case '/stats':
        await this.printStats();
        return true;
      case '/help':
        for (const line of HELP_TEXT) this.io.print(line);
        return true;
      default:
        this.io.print(`Unknown command: ${name}. Type /help for commands.`);
        return true;
    }
  }

  private async runSearch(): Promise<void> {
    const query = (await this.io.ask('Search query: ')).trim();
    if (!query) return;

    const results = await this.search.search(query, { userId: this.userId }, 5);
    this.io.print(`Found ${results.length} result(s):`);
    results.forEach((doc, i) => {
      this.io.print(`${i + 1}. Session: ${doc.sessionId.slice(0, 8)}...`);
      this.io.print(
        `   Intent: ${doc.intent ?? 'none'} | Resolved: ${doc.resolved}`,
      );
      this.io.print(`   Messages: ${doc.turns.length}`);
    });
  }

  private async printStats(): Promise<void> {
    const stats = await this.search.statistics(this.userId);
    const intents = stats.intentCounts
      .map(({ intent, count }) => `${intent}=${count}`)
      .join(', ');
    this.io.print(`Statistics for ${this.userId}:`);
    this.io.print(`   Total conversations: ${stats.totalCount}`);
    this.io.print(`   Resolved: ${stats.resolvedCount}`);
    this.io.print(`   Intents: ${intents || 'none'}`);
  }
}
