import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { InvalidIdentifierError } from '../errors/invalid-identifier.error';
import type { Checkpoint } from '../interfaces/checkpoint.interface';
import { CheckpointManager } from './checkpoint-manager.service';
import { THREAD_ID_SEPARATOR } from '../engine.constants';

export interface ResolvedThread {
  threadId: string;
  sessionId: string;
  isNew: boolean;
  /** Latest checkpoint, null for a new thread */
  checkpoint: Checkpoint | null;
}

@Injectable()
export class SessionRouter {
  private readonly logger = new Logger(SessionRouter.name);

  constructor(private readonly checkpoints: CheckpointManager) {}

  createSessionId(): string {
    return randomUUID();
  }

  /** Same (user, session) pair always yields the same thread id. */
  threadIdFor(userId: string, sessionId: string): string {
    if (!userId.trim()) {
      throw new InvalidIdentifierError('userId', userId, 'must not be empty');
    }
    if (userId.includes(THREAD_ID_SEPARATOR)) {
      throw new InvalidIdentifierError(
        'userId',
        userId,
        `must not contain "${THREAD_ID_SEPARATOR}"`,
      );
    }
    if (!sessionId.trim()) {
      throw new InvalidIdentifierError(
        'sessionId',
        sessionId,
        'must not be empty',
      );
    }
    return `${userId}${THREAD_ID_SEPARATOR}${sessionId}`;
  }

  async resolveThread(
    namespace: string,
    userId: string,
    sessionId?: string,
  ): Promise<ResolvedThread> {
    if (sessionId === undefined) {
      const created = this.createSessionId();
      const threadId = this.threadIdFor(userId, created);
      this.logger.log(`New session: ${created}`);
      return { threadId, sessionId: created, isNew: true, checkpoint: null };
    }

    const threadId = this.threadIdFor(userId, sessionId);
    const checkpoint = await this.checkpoints.load(namespace, threadId);
    if (checkpoint) {
      this.logger.log(
        `Resuming session ${sessionId} from checkpoint v${checkpoint.version}`,
      );
    } else {
      this.logger.log(`Starting new conversation for session ${sessionId}`);
    }
    return { threadId, sessionId, isNew: !checkpoint, checkpoint };
  }
}
