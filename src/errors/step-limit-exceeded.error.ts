export class StepLimitExceededError extends Error {
  constructor(
    public readonly threadId: string,
    public readonly steps: number,
    public readonly maxSteps: number,
  ) {
    super(
      `Step limit (${maxSteps}) exceeded for thread ${threadId}. ` +
        `Reached step ${steps}. Check the graph for cycles without a terminal edge.`,
    );
    this.name = 'StepLimitExceededError';
  }
}
