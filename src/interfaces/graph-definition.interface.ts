import type {
  BusinessFields,
  ConversationState,
} from './conversation-state.interface';

/** Edge target that ends the turn. */
export const END = '__end__';

export interface NodeContext {
  graphId: string;
  threadId: string;
  /** Zero-based position of this node within the current turn */
  step: number;
}

/** Business fields a node wants to change. Absent keys are left as-is. */
export type NodePatch = Partial<BusinessFields>;

export type NodeFunction = (
  state: Readonly<ConversationState>,
  context: NodeContext,
) => NodePatch | Promise<NodePatch>;

/** Returns one of the keys declared in the conditional edge's `targets`. */
export type RouterFunction = (state: Readonly<ConversationState>) => string;

export interface ConditionalEdge {
  router: RouterFunction;
  /** Route key -> node name or END */
  targets: Record<string, string>;
}

export type EdgeSpec = string | ConditionalEdge;

export interface GraphSpec {
  id: string;
  start: string;
  nodes: Record<string, NodeFunction>;
  /** Nodes without an entry are terminal. */
  edges?: Record<string, EdgeSpec>;
  interruptBefore?: string[];
  /** Reply shown while the thread waits at an interrupt. Defaults to the draft reply. */
  interruptReply?: (state: Readonly<ConversationState>) => string | undefined;
  /** Whether a terminal edge marks the thread resolved. Defaults to always. */
  resolveOnTerminal?: (state: Readonly<ConversationState>) => boolean;
}

export type CompiledEdge =
  | { kind: 'static'; target: string }
  | {
      kind: 'conditional';
      router: RouterFunction;
      targets: Readonly<Record<string, string>>;
    };

export interface GraphDefinition {
  readonly id: string;
  readonly start: string;
  readonly nodes: ReadonlyMap<string, NodeFunction>;
  readonly edges: ReadonlyMap<string, CompiledEdge>;
  readonly interruptBefore: ReadonlySet<string>;
  readonly interruptReply: (
    state: Readonly<ConversationState>,
  ) => string | undefined;
  readonly resolveOnTerminal: (state: Readonly<ConversationState>) => boolean;
}

/** Implemented by classes marked with @DurableGraph. */
export interface GraphProvider {
  define(): Omit<GraphSpec, 'id'> & { id?: string };
}
