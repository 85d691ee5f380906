import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomUUID } from 'crypto';
import { CheckpointConflictError } from '../errors/checkpoint-conflict.error';
import { CheckpointWriteError } from '../errors/checkpoint-write.error';
import { GraphNotRegisteredError } from '../errors/graph-not-registered.error';
import { GraphRoutingError } from '../errors/graph-routing.error';
import { InvalidCheckpointError } from '../errors/invalid-checkpoint.error';
import { NodeExecutionError } from '../errors/node-execution.error';
import { EngineEventType } from '../events/engine-event-type.enum';
import type {
  TurnCompletedEvent,
  TurnFailedEvent,
  TurnInterruptedEvent,
} from '../events/engine-events';
import type { ConversationState } from '../interfaces/conversation-state.interface';
import type { ResolvedEngineOptions } from '../interfaces/engine-module-options.interface';
import type { GraphDefinition } from '../interfaces/graph-definition.interface';
import type {
  TurnFailure,
  TurnResult,
} from '../interfaces/turn-result.interface';
import { GraphEngine, type TurnInput } from '../engines/graph.engine';
import { GraphRegistry } from './graph-registry.service';
import { Indexer } from './indexer.service';
import { SessionRouter, type ResolvedThread } from './session-router.service';
import { KeyedMutex } from '../utils/keyed-mutex';
import { ENGINE_MODULE_OPTIONS, FAILED_TURN_REPLY } from '../engine.constants';

interface TurnContext {
  graph: GraphDefinition;
  userId: string;
  sessionId: string;
  threadId: string;
  message: string;
}

/**
 * Entry point for conversation turns. One turn per thread runs at a time in
 * this process; the checkpoint version check covers other processes.
 */
@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly registry: GraphRegistry,
    private readonly router: SessionRouter,
    private readonly engine: GraphEngine,
    private readonly indexer: Indexer,
    private readonly eventEmitter: EventEmitter2,
    @Inject(ENGINE_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedEngineOptions, 'defaultGraphId'>,
  ) {}

  /**
   * Runs one turn. Omitting `sessionId` starts a new session.
   *
   * @throws InvalidIdentifierError for a malformed user or session id
   * @throws GraphNotRegisteredError for an unknown graph
   */
  async runTurn(
    userId: string,
    message: string,
    sessionId?: string,
    graphId?: string,
  ): Promise<TurnResult> {
    const graph = this.resolveGraph(graphId);

    if (sessionId === undefined) {
      const thread = await this.router.resolveThread(graph.id, userId);
      return this.mutex.runExclusive(thread.threadId, () =>
        this.execute(graph, userId, message, thread),
      );
    }

    const threadId = this.router.threadIdFor(userId, sessionId);
    return this.mutex.runExclusive(threadId, async () => {
      let thread: ResolvedThread;
      try {
        thread = await this.router.resolveThread(graph.id, userId, sessionId);
      } catch (error) {
        const context = { graph, userId, sessionId, threadId, message };
        return this.fail(context, this.freshState(context), true, error);
      }
      return this.execute(graph, userId, message, thread);
    });
  }

  isThreadBusy(userId: string, sessionId: string): boolean {
    return this.mutex.isLocked(this.router.threadIdFor(userId, sessionId));
  }

  private resolveGraph(graphId?: string): GraphDefinition {
    const id = graphId ?? this.options.defaultGraphId;
    if (id !== undefined) {
      return this.registry.getOrThrow(id).definition;
    }

    const all = this.registry.getAll();
    if (all.length !== 1) {
      throw new GraphNotRegisteredError('(default)');
    }
    return all[0].definition;
  }

  private async execute(
    graph: GraphDefinition,
    userId: string,
    message: string,
    thread: ResolvedThread,
  ): Promise<TurnResult> {
    const context: TurnContext = {
      graph,
      userId,
      sessionId: thread.sessionId,
      threadId: thread.threadId,
      message,
    };

    let input: TurnInput;
    try {
      input = this.prepare(context, thread);
    } catch (error) {
      return this.fail(context, this.freshState(context), thread.isNew, error);
    }

    try {
      const execution = await this.engine.executeTurn(graph, input);

      this.indexer.publish(execution.state);

      if (execution.status === 'interrupted') {
        const interruptedAt = execution.nextNode ?? graph.start;
        this.eventEmitter.emit(EngineEventType.TURN_INTERRUPTED, {
          graphId: graph.id,
          threadId: context.threadId,
          sessionId: context.sessionId,
          isNewThread: thread.isNew,
          interruptedAt,
          timestamp: new Date(),
        } satisfies TurnInterruptedEvent);

        return {
          status: 'interrupted',
          state: execution.state,
          sessionId: context.sessionId,
          threadId: context.threadId,
          isNewThread: thread.isNew,
          visitedNodes: execution.visitedNodes,
          interruptedAt,
        };
      }

      this.eventEmitter.emit(EngineEventType.TURN_COMPLETED, {
        graphId: graph.id,
        threadId: context.threadId,
        sessionId: context.sessionId,
        isNewThread: thread.isNew,
        visitedNodes: execution.visitedNodes,
        resolved: execution.state.resolved ?? false,
        timestamp: new Date(),
      } satisfies TurnCompletedEvent);

      this.logger.log(
        `Thread ${context.threadId}: turn completed via ${execution.visitedNodes.join(' -> ')}`,
      );

      return {
        status: 'completed',
        state: execution.state,
        sessionId: context.sessionId,
        threadId: context.threadId,
        isNewThread: thread.isNew,
        visitedNodes: execution.visitedNodes,
      };
    } catch (error) {
      return this.fail(context, input.state, thread.isNew, error);
    }
  }

  /** Applies the user message to the loaded (or a fresh) state. */
  private prepare(context: TurnContext, thread: ResolvedThread): TurnInput {
    const checkpoint = thread.checkpoint;
    if (!checkpoint) {
      return {
        state: this.freshState(context),
        cursor: context.graph.start,
        resumingInterrupt: false,
        checkpointVersion: null,
      };
    }

    const prior = checkpoint.state;
    // Only a thread parked at an interrupt resumes mid-graph; new input
    // otherwise re-enters at the start node.
    const parkedAt = prior.awaitingExternalInput ? checkpoint.nextNode : null;
    const resumingInterrupt = parkedAt !== null;
    const cursor = parkedAt ?? context.graph.start;
    if (!context.graph.nodes.has(cursor)) {
      throw new InvalidCheckpointError(
        context.threadId,
        `Checkpoint for thread ${context.threadId} resumes at "${cursor}", which graph ${context.graph.id} does not define`,
      );
    }

    const now = new Date().toISOString();
    return {
      state: {
        ...prior,
        userMessage: context.message,
        turns: [
          ...prior.turns,
          { role: 'user', content: context.message, timestamp: now },
        ],
        updatedAt: now,
      },
      cursor,
      resumingInterrupt,
      checkpointVersion: checkpoint.version,
    };
  }

  private freshState(context: TurnContext): ConversationState {
    const now = new Date().toISOString();
    return {
      threadId: context.threadId,
      userId: context.userId,
      sessionId: context.sessionId,
      userMessage: context.message,
      fields: {},
      awaitingExternalInput: false,
      traceId: randomUUID().replace(/-/g, '').slice(0, 8),
      turns: [{ role: 'user', content: context.message, timestamp: now }],
      createdAt: now,
      updatedAt: now,
    };
  }

  private fail(
    context: TurnContext,
    state: ConversationState,
    isNewThread: boolean,
    error: unknown,
  ): TurnResult {
    const failure = this.toFailure(error);

    this.logger.error(
      `Thread ${context.threadId}: turn failed (${failure.kind}): ${failure.message}`,
      error instanceof Error ? error.stack : undefined,
    );

    this.eventEmitter.emit(EngineEventType.TURN_FAILED, {
      graphId: context.graph.id,
      threadId: context.threadId,
      sessionId: context.sessionId,
      failure,
      timestamp: new Date(),
    } satisfies TurnFailedEvent);

    return {
      status: 'failed',
      state: {
        ...state,
        fields: { ...state.fields, finalReply: FAILED_TURN_REPLY },
        resolved: false,
      },
      sessionId: context.sessionId,
      threadId: context.threadId,
      isNewThread,
      error: failure,
    };
  }

  private toFailure(error: unknown): TurnFailure {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof NodeExecutionError) {
      return { kind: 'node', message, node: error.node };
    }
    if (error instanceof GraphRoutingError) {
      return { kind: 'routing', message, node: error.node };
    }
    if (
      error instanceof CheckpointWriteError ||
      error instanceof CheckpointConflictError ||
      error instanceof InvalidCheckpointError
    ) {
      return { kind: 'checkpoint', message };
    }
    return { kind: 'internal', message };
  }
}
