import { Inject, Injectable } from '@nestjs/common';
import { setTimeout as delay } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';

import { LoggerService } from '../core/services/logger.service';
import type { OperationRegistry } from '../graph-core/operationRegistry';
import { ConsistencyError, ExecutionError, FatalError, InvalidInputError } from '../graph/errors';
import type { OperationEntry } from '../operations/operation.types';
import type { Dataset } from '../shared/types/graph.types';
import type {
  ExecutionSummary,
  NodeOutcome,
  NodeStatus,
  NodeTransition,
  PlannedNode,
  SerializedError,
  StagedPlan,
} from './execution.types';
import { WorkerPool } from './workerPool';

export interface ExecutorOptions {
  registry: OperationRegistry;
  concurrency: number;
  /** Total attempts allowed per node, first attempt included. */
  retryBudget: number;
  retryDelayMs?: number;
  signal?: AbortSignal;
  dataset?: Dataset;
  runId?: string;
  onTransition?: (transition: NodeTransition) => void;
}

interface RetryState {
  attemptsRemaining: number;
  attempts: number;
  status: NodeStatus;
  result?: unknown;
  error?: unknown;
}

interface Abort {
  nodeId: string;
  attempts: number;
  cause: unknown;
}

interface RunContext {
  runId: string;
  plan: StagedPlan;
  options: ExecutorOptions;
  states: Map<string, RetryState>;
  pool: WorkerPool;
  // Aborted on external cancellation or on the first fatal node; units see it as ctx.signal.
  controller: AbortController;
  fatal?: Abort;
}

const serializeError = (err: unknown): SerializedError =>
  err instanceof Error ? { name: err.name, message: err.message } : { name: 'Error', message: String(err) };

/**
 * Runs a staged plan over a bounded worker pool. Stages are separated by a
 * barrier: stage i+1 starts only after every node loop of stage i (retries
 * included) has settled. Node loops never reject, so the barrier cannot be
 * cut short by a failing sibling.
 */
@Injectable()
export class Executor {
  constructor(@Inject(LoggerService) private readonly logger: LoggerService) {}

  async run(plan: StagedPlan, options: ExecutorOptions): Promise<ExecutionSummary> {
    for (const field of ['concurrency', 'retryBudget'] as const) {
      const value = options[field];
      if (!Number.isInteger(value) || value < 1) {
        throw new InvalidInputError(field, `must be a positive integer, got ${value}`);
      }
    }

    const startedAt = new Date();
    const ctx: RunContext = {
      runId: options.runId ?? uuidv4(),
      plan,
      options,
      states: new Map(),
      pool: new WorkerPool(options.concurrency),
      controller: new AbortController(),
    };
    for (const id of plan.nodes.keys()) {
      ctx.states.set(id, { attemptsRemaining: options.retryBudget, attempts: 0, status: 'pending' });
    }

    const external = options.signal;
    const onExternalAbort = () => ctx.controller.abort(external?.reason);
    if (external?.aborted) onExternalAbort();
    else external?.addEventListener('abort', onExternalAbort, { once: true });

    this.logger.info('Execution started', {
      runId: ctx.runId,
      graphVersion: plan.version,
      stages: plan.stages.length,
      nodes: plan.nodes.size,
      concurrency: options.concurrency,
      retryBudget: options.retryBudget,
    });

    try {
      for (const [index, stage] of plan.stages.entries()) {
        if (ctx.controller.signal.aborted) break;
        this.logger.debug('Stage started', { runId: ctx.runId, stage: index, nodes: [...stage] });
        await Promise.all(stage.map((id) => this.runNode(ctx, id)));
      }
    } finally {
      ctx.pool.close();
      external?.removeEventListener('abort', onExternalAbort);
    }

    const summary = this.summarize(ctx, startedAt);
    if (ctx.fatal) {
      const { nodeId, attempts, cause } = ctx.fatal;
      this.logger.error('Execution aborted', { runId: ctx.runId, nodeId, attempts, error: cause });
      throw new FatalError(nodeId, attempts, cause, summary);
    }
    this.logger.info('Execution finished', { runId: ctx.runId, status: summary.status });
    return summary;
  }

  private async runNode(ctx: RunContext, id: string): Promise<void> {
    const node = ctx.plan.nodes.get(id);
    const state = ctx.states.get(id);
    if (!node || !state) {
      this.abort(ctx, id, 0, new ConsistencyError([id]));
      return;
    }

    let entry: OperationEntry;
    try {
      entry = ctx.options.registry.lookup(node.kind, id);
      ctx.options.registry.validate(node.kind, node.parameters, id);
    } catch (err) {
      state.status = 'failed';
      state.error = err;
      this.abort(ctx, id, 0, err);
      return;
    }

    while (!ctx.controller.signal.aborted) {
      const lease = await ctx.pool.acquire();
      // Cancellation or a sibling's abort may have landed while queued for a worker.
      if (ctx.controller.signal.aborted) {
        lease.release();
        return;
      }

      const attempt = ++state.attempts;
      state.attemptsRemaining--;
      this.transition(ctx, id, attempt, 'running');
      try {
        entry.unit.validate?.(node.parameters);
        state.result = await entry.unit.execute(node.parameters, {
          nodeId: id,
          attempt,
          inputs: this.collectInputs(ctx, node),
          dataset: ctx.options.dataset ?? {},
          signal: ctx.controller.signal,
        });
        state.error = undefined;
        this.transition(ctx, id, attempt, 'succeeded');
        return;
      } catch (err) {
        state.error = err;
        this.transition(ctx, id, attempt, 'failed', err);
      } finally {
        lease.release();
      }

      if (state.attemptsRemaining <= 0) {
        this.abort(ctx, id, attempt, new ExecutionError(id, attempt, state.error));
        return;
      }
      if (ctx.controller.signal.aborted) return;

      this.transition(ctx, id, attempt, 'pending');
      const wait = ctx.options.retryDelayMs ?? 0;
      if (wait > 0) await this.backoff(ctx, wait);
    }
  }

  // Cut short by cancellation or a sibling's abort; the loop condition then exits.
  private async backoff(ctx: RunContext, ms: number): Promise<void> {
    const { signal } = ctx.controller;
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  }

  private collectInputs(ctx: RunContext, node: PlannedNode): Map<string, unknown> {
    const inputs = new Map<string, unknown>();
    for (const predecessor of node.predecessors) {
      inputs.set(predecessor, ctx.states.get(predecessor)?.result);
    }
    return inputs;
  }

  private abort(ctx: RunContext, nodeId: string, attempts: number, cause: unknown): void {
    if (ctx.fatal) return;
    ctx.fatal = { nodeId, attempts, cause };
    ctx.controller.abort(cause);
  }

  private transition(ctx: RunContext, nodeId: string, attempt: number, to: NodeStatus, error?: unknown): void {
    const state = ctx.states.get(nodeId);
    if (!state) return;
    const from = state.status;
    state.status = to;
    const event: NodeTransition = { runId: ctx.runId, nodeId, attempt, from, to, at: Date.now() };
    if (error !== undefined) event.error = error;

    if (to === 'failed') {
      this.logger.warn('Node attempt failed', {
        runId: ctx.runId,
        nodeId,
        attempt,
        attemptsRemaining: state.attemptsRemaining,
        error,
      });
    } else {
      this.logger.debug('Node transition', { runId: ctx.runId, nodeId, attempt, from, to });
    }

    const listener = ctx.options.onTransition;
    if (!listener) return;
    try {
      listener(event);
    } catch (err) {
      this.logger.warn('Transition listener threw', { runId: ctx.runId, nodeId, error: err });
    }
  }

  private summarize(ctx: RunContext, startedAt: Date): ExecutionSummary {
    const nodes: NodeOutcome[] = [];
    for (const stage of ctx.plan.stages) {
      for (const id of stage) {
        const planned = ctx.plan.nodes.get(id);
        const state = ctx.states.get(id);
        if (!planned || !state) continue;
        const outcome: NodeOutcome = {
          nodeId: id,
          kind: planned.kind,
          stage: planned.stage,
          status: state.status,
          attempts: state.attempts,
        };
        if (state.status === 'succeeded') outcome.result = state.result;
        if (state.status === 'failed' && state.error !== undefined) outcome.error = serializeError(state.error);
        nodes.push(outcome);
      }
    }

    const status = ctx.fatal ? 'failed' : nodes.every((n) => n.status === 'succeeded') ? 'succeeded' : 'cancelled';
    const summary: ExecutionSummary = {
      runId: ctx.runId,
      status,
      graphVersion: ctx.plan.version,
      stages: ctx.plan.stages.map((stage) => [...stage]),
      nodes,
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
    };
    if (ctx.fatal) summary.failedNode = ctx.fatal.nodeId;
    return summary;
  }
}
