import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';

import { ConfigService } from '../core/services/config.service';
import { LoggerService } from '../core/services/logger.service';
import { OperationRegistry } from '../graph-core/operationRegistry';
import { FatalError, GraphError, describeError } from '../graph/errors';
import { GraphService } from '../graph/graph.service';
import type { Dataset } from '../shared/types/graph.types';
import { DependencyResolver } from './dependencyResolver';
import type {
  ExecutionSummary,
  NodeStatus,
  RunStatus,
  SerializedError,
  StagedPlan,
} from './execution.types';
import { Executor, type ExecutorOptions } from './executor';

export interface ExecuteRequest {
  dataset?: Dataset;
  concurrency?: number;
  retryBudget?: number;
  retryDelayMs?: number;
}

export interface RunRecord {
  runId: string;
  status: 'running' | RunStatus;
  graphVersion: number;
  stages: string[][];
  startedAt: string;
  finishedAt?: string;
  // Live per-node status while running; final statuses once finished.
  nodes: Record<string, NodeStatus>;
  cancelRequested: boolean;
  summary?: ExecutionSummary;
  error?: SerializedError & { code?: string };
}

interface TrackedRun {
  record: RunRecord;
  controller: AbortController;
  done: Promise<RunRecord>;
  failure?: unknown;
}

/**
 * Execute(): snapshot the live graph, resolve it into stages and run it.
 * Runs are tracked by id in a bounded history; background runs can be
 * cancelled while in flight.
 */
@Injectable()
export class ExecutionService {
  private readonly runs = new Map<string, TrackedRun>();

  constructor(
    @Inject(GraphService) private readonly graph: GraphService,
    @Inject(OperationRegistry) private readonly registry: OperationRegistry,
    @Inject(DependencyResolver) private readonly resolver: DependencyResolver,
    @Inject(Executor) private readonly executor: Executor,
    @Inject(ConfigService) private readonly config: ConfigService,
    @Inject(LoggerService) private readonly logger: LoggerService,
  ) {}

  plan(): StagedPlan {
    return this.resolver.resolve(this.graph.snapshot());
  }

  /** Runs to completion; rejects with FatalError when a node exhausts its budget. */
  async execute(request: ExecuteRequest = {}): Promise<ExecutionSummary> {
    const tracked = this.track(request);
    const record = await tracked.done;
    if (tracked.failure !== undefined) throw tracked.failure;
    if (!record.summary) throw new Error(`Run ${record.runId} finished without a summary`);
    return record.summary;
  }

  /** Starts a run in the background and returns its record immediately. */
  start(request: ExecuteRequest = {}): RunRecord {
    return this.track(request).record;
  }

  get(runId: string): RunRecord | undefined {
    return this.runs.get(runId)?.record;
  }

  /** Newest first. */
  list(): RunRecord[] {
    return Array.from(this.runs.values(), (run) => run.record).reverse();
  }

  /** False when the run already finished; undefined for an unknown id. */
  cancel(runId: string): boolean | undefined {
    const run = this.runs.get(runId);
    if (!run) return undefined;
    if (run.record.status !== 'running') return false;
    run.record.cancelRequested = true;
    run.controller.abort(new Error(`Run ${runId} cancelled`));
    this.logger.info('Execution cancel requested', { runId });
    return true;
  }

  private track(request: ExecuteRequest): TrackedRun {
    const plan = this.plan();
    const runId = uuidv4();
    const controller = new AbortController();
    const nodes: Record<string, NodeStatus> = {};
    for (const id of plan.nodes.keys()) nodes[id] = 'pending';
    const record: RunRecord = {
      runId,
      status: 'running',
      graphVersion: plan.version,
      stages: plan.stages.map((stage) => [...stage]),
      startedAt: new Date().toISOString(),
      nodes,
      cancelRequested: false,
    };

    const options: ExecutorOptions = {
      registry: this.registry,
      concurrency: request.concurrency ?? this.config.executorConcurrency,
      retryBudget: request.retryBudget ?? this.config.executorRetryBudget,
      retryDelayMs: request.retryDelayMs ?? this.config.executorRetryDelayMs,
      dataset: request.dataset,
      signal: controller.signal,
      runId,
      onTransition: (t) => {
        record.nodes[t.nodeId] = t.to;
      },
    };
    const tracked: TrackedRun = {
      record,
      controller,
      done: this.executor.run(plan, options).then(
        (summary) => this.finish(record, summary),
        (err: unknown) => {
          tracked.failure = err;
          return this.fail(record, err);
        },
      ),
    };

    this.runs.set(runId, tracked);
    this.prune();
    return tracked;
  }

  private finish(record: RunRecord, summary: ExecutionSummary): RunRecord {
    record.status = summary.status;
    record.summary = summary;
    record.finishedAt = summary.finishedAt;
    for (const node of summary.nodes) record.nodes[node.nodeId] = node.status;
    return record;
  }

  private fail(record: RunRecord, err: unknown): RunRecord {
    if (err instanceof FatalError) this.finish(record, err.summary);
    record.status = 'failed';
    record.finishedAt ??= new Date().toISOString();
    record.error = {
      name: err instanceof Error ? err.name : 'Error',
      message: describeError(err),
      ...(err instanceof GraphError ? { code: err.code } : {}),
    };
    this.logger.error('Execution failed', { runId: record.runId, error: err });
    return record;
  }

  // Drops the oldest finished runs beyond the history limit; running ones stay.
  private prune(): void {
    let excess = this.runs.size - this.config.executionHistoryLimit;
    for (const [runId, run] of this.runs) {
      if (excess <= 0) break;
      if (run.record.status === 'running') continue;
      this.runs.delete(runId);
      excess--;
    }
  }
}
