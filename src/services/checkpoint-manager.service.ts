import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CheckpointConflictError } from '../errors/checkpoint-conflict.error';
import { CheckpointWriteError } from '../errors/checkpoint-write.error';
import { EngineEventType } from '../events/engine-event-type.enum';
import type { CheckpointSavedEvent } from '../events/engine-events';
import type { Checkpoint } from '../interfaces/checkpoint.interface';
import type { ConversationState } from '../interfaces/conversation-state.interface';
import type { IStateStore } from '../interfaces/state-store.interface';
import {
  deepClone,
  dehydrateCheckpoint,
  hydrateCheckpoint,
} from '../utils/hydrate-checkpoint';
import { STATE_STORE } from '../engine.constants';

/**
 * Thread-scoped, versioned access to the primary store. Each save is a full
 * overwrite that must advance the stored version by exactly one.
 */
@Injectable()
export class CheckpointManager implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CheckpointManager.name);

  constructor(
    @Inject(STATE_STORE) private readonly store: IStateStore,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  get durable(): boolean {
    return this.store.durable;
  }

  async onModuleInit(): Promise<void> {
    await this.store.setup();
    if (!this.store.durable) {
      this.logger.warn(
        'Checkpoint store is in-memory: conversation state will not survive a restart',
      );
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.store.close();
  }

  async load(namespace: string, threadId: string): Promise<Checkpoint | null> {
    const stored = await this.store.get(namespace, threadId);
    if (!stored) return null;
    return hydrateCheckpoint(stored);
  }

  /**
   * Resolves only after the store acknowledged the write.
   * @param expectedVersion - version of the checkpoint the caller loaded,
   *   null for a thread that has none yet
   */
  async save(
    namespace: string,
    threadId: string,
    state: ConversationState,
    nextNode: string | null,
    expectedVersion: number | null,
  ): Promise<Checkpoint> {
    const version = (expectedVersion ?? 0) + 1;
    const payload = dehydrateCheckpoint(state, nextNode);

    try {
      await this.store.put(
        namespace,
        threadId,
        { version, payload: { ...payload } },
        expectedVersion,
      );
    } catch (error) {
      if (error instanceof CheckpointConflictError) {
        throw error;
      }
      throw new CheckpointWriteError(
        threadId,
        error instanceof Error ? error.message : String(error),
        error,
      );
    }

    const savedAt = new Date();
    this.eventEmitter.emit(EngineEventType.CHECKPOINT_SAVED, {
      namespace,
      threadId,
      version,
      nextNode,
      timestamp: savedAt,
    } satisfies CheckpointSavedEvent);

    this.logger.debug(
      `Checkpoint ${namespace}/${threadId} v${version} saved, next=${nextNode ?? 'none'}`,
    );

    return {
      threadId,
      namespace,
      version,
      state: deepClone(payload.state),
      nextNode,
      savedAt,
    };
  }
}
