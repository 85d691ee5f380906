export class GraphConfigurationError extends Error {
  constructor(
    public readonly graphId: string,
    message: string,
  ) {
    super(`Graph ${graphId}: ${message}`);
    this.name = 'GraphConfigurationError';
  }
}
