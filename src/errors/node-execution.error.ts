export class NodeExecutionError extends Error {
  constructor(
    public readonly threadId: string,
    public readonly node: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Node "${node}" failed for thread ${threadId}: ${message}`, { cause });
    this.name = 'NodeExecutionError';
  }
}
