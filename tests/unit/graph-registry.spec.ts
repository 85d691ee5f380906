import { Injectable } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { GraphRegistry } from '../../src/services/graph-registry.service';
import { DurableGraph } from '../../src/decorators/durable-graph.decorator';
import { DuplicateGraphError } from '../../src/errors/duplicate-graph.error';
import { GraphConfigurationError } from '../../src/errors/graph-configuration.error';
import { GraphNotRegisteredError } from '../../src/errors/graph-not-registered.error';
import {
  END,
  type GraphProvider,
  type GraphSpec,
} from '../../src/interfaces/graph-definition.interface';
import { createMockRegistry } from '../helpers';

const echoSpec: GraphSpec = {
  id: 'echo',
  start: 'reply',
  nodes: { reply: (state) => ({ finalReply: state.userMessage }) },
  edges: { reply: END },
};

@DurableGraph()
@Injectable()
class BillingGraph implements GraphProvider {
  define() {
    return { start: 'a', nodes: { a: () => ({}) } };
  }
}

@DurableGraph({ id: 'named' })
@Injectable()
class NamedGraph implements GraphProvider {
  define() {
    return { start: 'a', nodes: { a: () => ({}) } };
  }
}

@DurableGraph()
@Injectable()
class NotAGraph {}

function registryWithProviders(
  instances: object[],
  graphs: GraphSpec[] = [],
): GraphRegistry {
  const discovery = {
    getProviders: () =>
      instances.map((instance) => ({
        metatype: instance.constructor,
        instance,
      })),
  } as unknown as DiscoveryService;
  return new GraphRegistry(discovery, new Reflector(), { graphs });
}

describe('GraphRegistry', () => {
  it('should register and retrieve a compiled graph', () => {
    const registry = createMockRegistry();
    registry.register(echoSpec, 'test');

    const registration = registry.get('echo');
    expect(registration?.id).toBe('echo');
    expect(registration?.source).toBe('test');
    expect(registration?.definition.start).toBe('reply');
    expect(Object.isFrozen(registration?.definition)).toBe(true);
  });

  it('should return undefined for an unknown graph', () => {
    expect(createMockRegistry().get('nope')).toBeUndefined();
  });

  it('should throw GraphNotRegisteredError from getOrThrow', () => {
    expect(() => createMockRegistry().getOrThrow('missing')).toThrow(
      GraphNotRegisteredError,
    );
    expect(() => createMockRegistry().getOrThrow('missing')).toThrow(
      'No conversation graph registered with id "missing".',
    );
  });

  it('should reject duplicate ids', () => {
    const registry = createMockRegistry();
    registry.register(echoSpec, 'first');

    expect(() => registry.register(echoSpec, 'second')).toThrow(
      DuplicateGraphError,
    );
    expect(() => registry.register(echoSpec, 'second')).toThrow(
      'Both first and second are registered with the same id.',
    );
  });

  it('should reject invalid graphs at registration', () => {
    expect(() =>
      createMockRegistry().register({ ...echoSpec, start: 'ghost' }, 'test'),
    ).toThrow(GraphConfigurationError);
  });

  it('should register graphs passed through options on init', () => {
    const registry = createMockRegistry([echoSpec]);
    registry.onModuleInit();

    expect(registry.getAll().map((r) => r.id)).toEqual(['echo']);
    expect(registry.get('echo')?.source).toBe('options');
  });

  it('should discover @DurableGraph providers', () => {
    const registry = registryWithProviders([new BillingGraph(), new NamedGraph()]);
    registry.onModuleInit();

    expect(registry.get('billing')?.source).toBe('BillingGraph');
    expect(registry.get('named')?.source).toBe('NamedGraph');
  });

  it('should reject a decorated provider without define()', () => {
    const registry = registryWithProviders([new NotAGraph()]);

    expect(() => registry.onModuleInit()).toThrow(
      'NotAGraph is marked @DurableGraph but has no define() method',
    );
  });

  it('should report a clash between options and a provider', () => {
    const registry = registryWithProviders(
      [new NamedGraph()],
      [{ ...echoSpec, id: 'named' }],
    );

    expect(() => registry.onModuleInit()).toThrow(DuplicateGraphError);
  });
});
