export class CheckpointWriteError extends Error {
  constructor(
    public readonly threadId: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Checkpoint write failed for thread ${threadId}: ${message}`, { cause });
    this.name = 'CheckpointWriteError';
  }
}
