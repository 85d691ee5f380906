import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { DuplicateGraphError } from '../errors/duplicate-graph.error';
import { GraphConfigurationError } from '../errors/graph-configuration.error';
import { GraphNotRegisteredError } from '../errors/graph-not-registered.error';
import type { DurableGraphMetadata } from '../decorators/durable-graph.decorator';
import type {
  GraphDefinition,
  GraphProvider,
  GraphSpec,
} from '../interfaces/graph-definition.interface';
import type { ResolvedEngineOptions } from '../interfaces/engine-module-options.interface';
import { compileGraph } from '../utils/compile-graph';
import {
  DURABLE_GRAPH_METADATA,
  ENGINE_MODULE_OPTIONS,
} from '../engine.constants';

export interface RegisteredGraph {
  id: string;
  definition: GraphDefinition;
  /** Provider class name, or "options" for graphs passed to forRoot */
  source: string;
}

function isGraphProvider(value: unknown): value is GraphProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'define' in value &&
    typeof value.define === 'function'
  );
}

@Injectable()
export class GraphRegistry implements OnModuleInit {
  private readonly logger = new Logger(GraphRegistry.name);
  private readonly registrations = new Map<string, RegisteredGraph>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
    @Inject(ENGINE_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedEngineOptions, 'graphs'>,
  ) {}

  onModuleInit(): void {
    for (const spec of this.options.graphs) {
      this.register(spec, 'options');
      this.logger.log(`Registered conversation graph: ${spec.id}`);
    }

    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      if (!wrapper.metatype) continue;

      const metadata = this.reflector.get<DurableGraphMetadata | undefined>(
        DURABLE_GRAPH_METADATA,
        wrapper.metatype,
      );
      if (!metadata) continue;

      const instance: unknown = wrapper.instance;
      if (!isGraphProvider(instance)) {
        throw new GraphConfigurationError(
          metadata.id,
          `${wrapper.metatype.name} is marked @DurableGraph but has no define() method`,
        );
      }

      const defined = instance.define();
      this.register(
        { ...defined, id: defined.id ?? metadata.id },
        wrapper.metatype.name,
      );
      this.logger.log(
        `Registered conversation graph: ${wrapper.metatype.name} -> ${defined.id ?? metadata.id}`,
      );
    }
  }

  /** Compiles and stores a graph. Throws on duplicates or invalid graphs. */
  register(spec: GraphSpec, source: string): RegisteredGraph {
    const existing = this.registrations.get(spec.id);
    if (existing) {
      throw new DuplicateGraphError(spec.id, existing.source, source);
    }
    const registration: RegisteredGraph = {
      id: spec.id,
      definition: compileGraph(spec),
      source,
    };
    this.registrations.set(spec.id, registration);
    return registration;
  }

  get(graphId: string): RegisteredGraph | undefined {
    return this.registrations.get(graphId);
  }

  getAll(): RegisteredGraph[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(graphId: string): RegisteredGraph {
    const registration = this.registrations.get(graphId);
    if (!registration) {
      throw new GraphNotRegisteredError(graphId);
    }
    return registration;
  }
}
