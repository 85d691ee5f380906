import { Inject, Injectable, Logger } from '@nestjs/common';
import { GraphConfigurationError } from '../errors/graph-configuration.error';
import { GraphRoutingError } from '../errors/graph-routing.error';
import { NodeExecutionError } from '../errors/node-execution.error';
import { StepLimitExceededError } from '../errors/step-limit-exceeded.error';
import {
  BUSINESS_FIELD_NAMES,
  type BusinessFieldName,
  type BusinessFields,
  type ConversationState,
} from '../interfaces/conversation-state.interface';
import {
  END,
  type GraphDefinition,
  type NodePatch,
} from '../interfaces/graph-definition.interface';
import type { ResolvedEngineOptions } from '../interfaces/engine-module-options.interface';
import type { TurnExecution } from '../interfaces/turn-result.interface';
import { CheckpointManager } from '../services/checkpoint-manager.service';
import { InterruptController } from '../services/interrupt-controller.service';
import { deepClone } from '../utils/hydrate-checkpoint';
import { ENGINE_MODULE_OPTIONS } from '../engine.constants';

export interface TurnInput {
  /** State with the new user message already applied */
  state: ConversationState;
  /** Node to enter first */
  cursor: string;
  /** The loaded checkpoint was parked at `cursor` awaiting this input */
  resumingInterrupt: boolean;
  /** Version of the loaded checkpoint, null for a new thread */
  checkpointVersion: number | null;
}

const FIELD_NAMES = new Set<string>(BUSINESS_FIELD_NAMES);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFieldName(name: string): name is BusinessFieldName {
  return FIELD_NAMES.has(name);
}

/**
 * Drives one turn over a compiled graph. Every executed node is followed by
 * a durable checkpoint before the next node is entered.
 */
@Injectable()
export class GraphEngine {
  private readonly logger = new Logger(GraphEngine.name);

  constructor(
    private readonly checkpoints: CheckpointManager,
    private readonly interrupts: InterruptController,
    @Inject(ENGINE_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedEngineOptions, 'maxSteps'>,
  ) {}

  async executeTurn(
    graph: GraphDefinition,
    input: TurnInput,
  ): Promise<TurnExecution> {
    const threadId = input.state.threadId;
    const visitedNodes: string[] = [];
    let state = deepClone(input.state);
    let version = input.checkpointVersion;
    let cursor = input.cursor;
    let bypassInterrupt = input.resumingInterrupt;
    let replied = false;

    if (bypassInterrupt) {
      state = { ...state, awaitingExternalInput: false };
    }

    for (;;) {
      if (
        !bypassInterrupt &&
        this.interrupts.shouldHaltBefore(graph, cursor)
      ) {
        return this.halt(graph, state, cursor, version, visitedNodes, replied);
      }
      bypassInterrupt = false;

      if (visitedNodes.length >= this.options.maxSteps) {
        throw new StepLimitExceededError(
          threadId,
          visitedNodes.length + 1,
          this.options.maxSteps,
        );
      }

      const result = await this.runNode(
        graph,
        state,
        cursor,
        visitedNodes.length,
      );
      state = result.state;
      replied = replied || result.wroteReply;
      visitedNodes.push(cursor);

      const next = this.resolveEdge(graph, cursor, state);
      if (next === END) {
        return this.complete(graph, state, version, visitedNodes, replied);
      }

      if (this.interrupts.shouldHaltBefore(graph, next)) {
        return this.halt(graph, state, next, version, visitedNodes, replied);
      }

      const saved = await this.checkpoints.save(
        graph.id,
        threadId,
        state,
        next,
        version,
      );
      version = saved.version;
      cursor = next;
    }
  }

  private async runNode(
    graph: GraphDefinition,
    state: ConversationState,
    node: string,
    step: number,
  ): Promise<{ state: ConversationState; wroteReply: boolean }> {
    const fn = graph.nodes.get(node);
    if (!fn) {
      throw new GraphConfigurationError(
        graph.id,
        `node "${node}" does not exist`,
      );
    }

    let patch: NodePatch;
    try {
      patch = await fn(deepClone(state), {
        graphId: graph.id,
        threadId: state.threadId,
        step,
      });
    } catch (error) {
      throw new NodeExecutionError(
        state.threadId,
        node,
        error instanceof Error ? error.message : String(error),
        error,
      );
    }

    const fields = this.applyPatch(state, node, patch);
    this.logger.debug(`Thread ${state.threadId}: node "${node}" executed`);
    return {
      state: { ...state, fields },
      wroteReply: patch.finalReply !== undefined,
    };
  }

  /** Node output is validated here, before it can reach a checkpoint. */
  private applyPatch(
    state: ConversationState,
    node: string,
    patch: unknown,
  ): BusinessFields {
    if (!isPlainObject(patch)) {
      throw new NodeExecutionError(
        state.threadId,
        node,
        'node must return an object of business fields',
      );
    }

    const fields: BusinessFields = { ...state.fields };
    for (const [name, value] of Object.entries(patch)) {
      if (!isFieldName(name)) {
        throw new NodeExecutionError(
          state.threadId,
          node,
          `unknown business field "${name}"`,
        );
      }
      if (value === undefined) continue;
      if (typeof value !== 'string') {
        throw new NodeExecutionError(
          state.threadId,
          node,
          `business field "${name}" must be a string`,
        );
      }
      if (name === 'replySource') {
        if (value !== 'enriched' && value !== 'fallback') {
          throw new NodeExecutionError(
            state.threadId,
            node,
            `replySource must be "enriched" or "fallback", got "${value}"`,
          );
        }
        fields.replySource = value;
      } else {
        fields[name] = value;
      }
    }
    return fields;
  }

  private resolveEdge(
    graph: GraphDefinition,
    node: string,
    state: ConversationState,
  ): string {
    const edge = graph.edges.get(node);
    if (!edge) return END;
    if (edge.kind === 'static') return edge.target;

    const route = edge.router(deepClone(state));
    if (!Object.prototype.hasOwnProperty.call(edge.targets, route)) {
      throw new GraphRoutingError(
        graph.id,
        node,
        String(route),
        Object.keys(edge.targets),
      );
    }
    this.logger.debug(`Thread ${state.threadId}: routing ${node} -> ${route}`);
    return edge.targets[route];
  }

  private async halt(
    graph: GraphDefinition,
    state: ConversationState,
    node: string,
    version: number | null,
    visitedNodes: string[],
    replied: boolean,
  ): Promise<TurnExecution> {
    const parked = this.interrupts.markInterrupted(graph, state);
    const noticeWritten =
      (graph.interruptReply(state) ?? state.fields.draftReply) !== undefined;
    const interrupted = this.closeTurn(parked, replied || noticeWritten);
    const saved = await this.checkpoints.save(
      graph.id,
      state.threadId,
      interrupted,
      node,
      version,
    );

    this.logger.log(
      `Thread ${state.threadId}: paused before "${node}" awaiting external input`,
    );

    return {
      status: 'interrupted',
      state: interrupted,
      nextNode: node,
      visitedNodes,
      checkpointVersion: saved.version,
    };
  }

  private async complete(
    graph: GraphDefinition,
    state: ConversationState,
    version: number | null,
    visitedNodes: string[],
    replied: boolean,
  ): Promise<TurnExecution> {
    const completed = this.closeTurn(
      {
        ...state,
        awaitingExternalInput: false,
        resolved: graph.resolveOnTerminal(state),
      },
      replied,
    );
    const saved = await this.checkpoints.save(
      graph.id,
      state.threadId,
      completed,
      null,
      version,
    );

    return {
      status: 'completed',
      state: completed,
      nextNode: null,
      visitedNodes,
      checkpointVersion: saved.version,
    };
  }

  /** Appends this turn's assistant reply, if one was written, and stamps the update time. */
  private closeTurn(
    state: ConversationState,
    replied: boolean,
  ): ConversationState {
    const now = new Date().toISOString();
    const reply = state.fields.finalReply;
    if (!replied || reply === undefined) {
      return { ...state, updatedAt: now };
    }
    return {
      ...state,
      turns: [
        ...state.turns,
        { role: 'assistant', content: reply, timestamp: now },
      ],
      updatedAt: now,
    };
  }
}
