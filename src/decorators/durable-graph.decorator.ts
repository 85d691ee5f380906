import { SetMetadata } from '@nestjs/common';
import { DURABLE_GRAPH_METADATA } from '../engine.constants';
import { deriveGraphId } from '../utils/derive-graph-id';

export interface DurableGraphOptions {
  /** Graph id and checkpoint namespace. If omitted, derived from class name. */
  id?: string;
}

export interface DurableGraphMetadata {
  id: string;
}

/**
 * Marks a provider whose `define()` returns a graph. The registry picks
 * it up during module init.
 */
export function DurableGraph(options: DurableGraphOptions = {}): ClassDecorator {
  return (target: Function) => {
    const metadata: DurableGraphMetadata = {
      id: options.id ?? deriveGraphId(target.name),
    };
    SetMetadata(DURABLE_GRAPH_METADATA, metadata)(target);
    Reflect.defineMetadata(DURABLE_GRAPH_METADATA, metadata, target);
  };
}
