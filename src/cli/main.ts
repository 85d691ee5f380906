#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, type INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createInterface } from 'readline/promises';
import { AppModule } from '../app.module';
import { ConversationService } from '../services/conversation.service';
import { ConversationSearchService } from '../services/conversation-search.service';
import { Indexer } from '../services/indexer.service';
import {
  DEFAULT_USER_ID,
  HELP_TEXT,
  InteractiveSession,
} from './interactive-session';
import {
  CliUsageError,
  USAGE,
  parseCliArgs,
  resolveLogLevels,
  type CliCommand,
} from './parse-args';
import { runScenarios } from './scenarios';

const logger = new Logger('ConversationAgent');

async function interactive(app: INestApplicationContext): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const io = {
    ask: (question: string) => rl.question(question),
    print: (line: string) => console.log(line),
  };

  try {
    console.log('='.repeat(60));
    console.log('  Customer Service Agent - Interactive Mode');
    console.log('='.repeat(60));
    HELP_TEXT.forEach((line) => console.log(line));

    const userId =
      (await rl.question(`Enter user ID (default: ${DEFAULT_USER_ID}): `)).trim() ||
      DEFAULT_USER_ID;
    console.log(`Started as user: ${userId}\n`);

    const session = new InteractiveSession(
      userId,
      app.get(ConversationService),
      app.get(ConversationSearchService),
      io,
    );

    for (;;) {
      const line = await rl.question(`[${userId}] You: `);
      try {
        if (!(await session.handle(line))) break;
      } catch (error) {
        logger.error(
          error instanceof Error ? error.message : String(error),
          error instanceof Error ? error.stack : undefined,
        );
        console.log(
          `Error: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  } finally {
    rl.close();
  }
}

async function execute(
  app: INestApplicationContext,
  command: CliCommand,
): Promise<number> {
  switch (command.mode) {
    case 'interactive':
      await interactive(app);
      return 0;
    case 'scenario': {
      const outcomes = await runScenarios(command.scenarios, {
        conversations: app.get(ConversationService),
        search: app.get(ConversationSearchService),
        indexer: app.get(Indexer),
        print: (line) => console.log(line),
      });
      const failed = outcomes.filter((outcome) => !outcome.passed);
      console.log(
        failed.length === 0
          ? `\nAll ${outcomes.length} scenario(s) passed`
          : `\n${failed.length} of ${outcomes.length} scenario(s) failed`,
      );
      return failed.length === 0 ? 0 : 1;
    }
    case 'search': {
      const results = await app
        .get(ConversationSearchService)
        .search(command.query, command.userId ? { userId: command.userId } : {});
      console.log(JSON.stringify(results, null, 2));
      return 0;
    }
    case 'stats': {
      const stats = await app
        .get(ConversationSearchService)
        .statistics(command.userId);
      console.log(JSON.stringify(stats, null, 2));
      return 0;
    }
    case 'help':
      console.log(USAGE);
      return 0;
  }
}

/** Boots the application; bootstrap errors reject instead of exiting the process. */
export function createCliContext(
  logLevel: string | undefined,
): Promise<INestApplicationContext> {
  return NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(logLevel),
    abortOnError: false,
  });
}

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (command.mode === 'help') {
    console.log(USAGE);
    return 0;
  }

  let app: INestApplicationContext;
  try {
    app = await createCliContext(process.env.LOG_LEVEL);
  } catch (error) {
    logger.error(
      `Initialization failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    return 1;
  }
  app.enableShutdownHooks();

  try {
    return await execute(app, command);
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      logger.error(
        'Fatal error',
        error instanceof Error ? error.stack : String(error),
      );
      process.exitCode = 1;
    });
}
