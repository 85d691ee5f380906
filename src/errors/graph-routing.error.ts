import { GraphConfigurationError } from './graph-configuration.error';

export class GraphRoutingError extends GraphConfigurationError {
  constructor(
    graphId: string,
    public readonly node: string,
    public readonly route: string,
    public readonly declaredRoutes: string[],
  ) {
    super(
      graphId,
      `router of node "${node}" returned undeclared route "${route}". ` +
        `Declared routes: ${declaredRoutes.join(', ')}.`,
    );
    this.name = 'GraphRoutingError';
  }
}
