export class CheckpointConflictError extends Error {
  constructor(
    public readonly namespace: string,
    public readonly threadId: string,
    public readonly expectedVersion: number | null,
  ) {
    super(
      `Checkpoint for ${namespace}/${threadId} is no longer at version ` +
        `${expectedVersion ?? 'none'}; another writer advanced it.`,
    );
    this.name = 'CheckpointConflictError';
  }
}
