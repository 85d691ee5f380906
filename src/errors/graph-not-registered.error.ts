export class GraphNotRegisteredError extends Error {
  constructor(public readonly graphId: string) {
    super(`No conversation graph registered with id "${graphId}".`);
    this.name = 'GraphNotRegisteredError';
  }
}
