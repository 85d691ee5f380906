import { GraphConfigurationError } from '../errors/graph-configuration.error';
import {
  END,
  type CompiledEdge,
  type EdgeSpec,
  type GraphDefinition,
  type GraphSpec,
  type NodeFunction,
} from '../interfaces/graph-definition.interface';

function toCompiledEdge(edge: EdgeSpec): CompiledEdge {
  if (typeof edge === 'string') {
    return { kind: 'static', target: edge };
  }
  return {
    kind: 'conditional',
    router: edge.router,
    targets: Object.freeze({ ...edge.targets }),
  };
}

function edgeTargets(edge: CompiledEdge): string[] {
  return edge.kind === 'static' ? [edge.target] : Object.values(edge.targets);
}

function assertTargetExists(
  graphId: string,
  nodes: ReadonlyMap<string, NodeFunction>,
  target: string,
  source: string,
): void {
  if (target !== END && !nodes.has(target)) {
    throw new GraphConfigurationError(
      graphId,
      `node "${source}" targets unknown node "${target}"`,
    );
  }
}

/**
 * Validates a graph spec for closure and freezes it. Every problem found
 * here is a configuration error and is raised before the graph is used.
 */
export function compileGraph(spec: GraphSpec): GraphDefinition {
  if (!spec.id || typeof spec.id !== 'string') {
    throw new GraphConfigurationError(
      String(spec.id),
      'id must be a non-empty string',
    );
  }

  const nodeNames = Object.keys(spec.nodes);
  if (nodeNames.length === 0) {
    throw new GraphConfigurationError(spec.id, 'graph has no nodes');
  }

  const nodes = new Map<string, NodeFunction>();
  for (const name of nodeNames) {
    if (name === END) {
      throw new GraphConfigurationError(
        spec.id,
        `"${END}" is reserved and cannot name a node`,
      );
    }
    const fn = spec.nodes[name];
    if (typeof fn !== 'function') {
      throw new GraphConfigurationError(
        spec.id,
        `node "${name}" is not a function`,
      );
    }
    nodes.set(name, fn);
  }

  if (!spec.start || !nodes.has(spec.start)) {
    throw new GraphConfigurationError(
      spec.id,
      `start node "${spec.start}" does not exist`,
    );
  }

  const edges = new Map<string, CompiledEdge>();
  for (const [source, edgeSpec] of Object.entries(spec.edges ?? {})) {
    if (!nodes.has(source)) {
      throw new GraphConfigurationError(
        spec.id,
        `edge declared from unknown node "${source}"`,
      );
    }

    const edge = toCompiledEdge(edgeSpec);
    if (edge.kind === 'conditional') {
      if (typeof edge.router !== 'function') {
        throw new GraphConfigurationError(
          spec.id,
          `conditional edge of node "${source}" has no router function`,
        );
      }
      if (Object.keys(edge.targets).length === 0) {
        throw new GraphConfigurationError(
          spec.id,
          `conditional edge of node "${source}" declares no targets`,
        );
      }
    }

    for (const target of edgeTargets(edge)) {
      assertTargetExists(spec.id, nodes, target, source);
    }
    edges.set(source, edge);
  }

  const interruptBefore = new Set<string>();
  for (const name of spec.interruptBefore ?? []) {
    if (!nodes.has(name)) {
      throw new GraphConfigurationError(
        spec.id,
        `interrupt declared before unknown node "${name}"`,
      );
    }
    interruptBefore.add(name);
  }

  const interruptReply =
    spec.interruptReply ?? ((state) => state.fields.draftReply);
  const resolveOnTerminal = spec.resolveOnTerminal ?? (() => true);

  return Object.freeze({
    id: spec.id,
    start: spec.start,
    nodes,
    edges,
    interruptBefore,
    interruptReply,
    resolveOnTerminal,
  });
}
