export class DuplicateGraphError extends Error {
  constructor(
    public readonly graphId: string,
    public readonly source1: string,
    public readonly source2: string,
  ) {
    super(
      `Duplicate graph id "${graphId}". ` +
        `Both ${source1} and ${source2} are registered with the same id.`,
    );
    this.name = 'DuplicateGraphError';
  }
}
