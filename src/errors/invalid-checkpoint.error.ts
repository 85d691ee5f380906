export class InvalidCheckpointError extends Error {
  constructor(
    public readonly threadId: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidCheckpointError';
  }
}
