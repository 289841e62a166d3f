import { describe, it, expect, vi } from 'vitest';

import { ConfigService, configSchema } from '../src/core/services/config.service';
import { DependencyResolver } from '../src/execution/dependencyResolver';
import { ExecutionService } from '../src/execution/execution.service';
import { Executor } from '../src/execution/executor';
import type { OperationRegistry } from '../src/graph-core/operationRegistry';
import { FatalError } from '../src/graph/errors';
import { GraphService } from '../src/graph/graph.service';
import { GraphFileRepository } from '../src/graph/graphFile.repository';
import type { OperationContext } from '../src/operations/operation.types';
import { Deferred, defaultRegistry, fakeRegistry, params, quietLogger } from './helpers/graph';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function makeServices(registry: OperationRegistry = defaultRegistry(), overrides: Record<string, unknown> = {}) {
  const config = new ConfigService().init(configSchema.parse({ graphFilePath: '/tmp/unused-graph.json', ...overrides }));
  const logger = quietLogger();
  const graph = new GraphService(registry, new GraphFileRepository(config, logger), logger);
  const executions = new ExecutionService(
    graph,
    registry,
    new DependencyResolver(),
    new Executor(logger),
    config,
    logger,
  );
  return { graph, executions };
}

describe('ExecutionService', () => {
  it('executes the live graph with the built-in units', async () => {
    const { graph, executions } = makeServices();
    graph.addNode('sum', 'ADD', [{ column: 'x' }, { column: 'y' }, { value: 5 }]);
    graph.addNode('avg', 'SMA', [{ column: 'sum' }, { value: 2 }]);
    graph.addEdge('sum', 'avg');

    const summary = await executions.execute({ dataset: { x: [1, 2, 3], y: [10, 20, 30] } });
    expect(summary.status).toBe('succeeded');
    expect(summary.graphVersion).toBe(3);
    expect(summary.nodes.map((n) => [n.nodeId, n.result])).toEqual([
      ['sum', [16, 27, 38]],
      ['avg', [null, 21.5, 32.5]],
    ]);

    const record = executions.get(summary.runId);
    expect(record).toMatchObject({ status: 'succeeded', nodes: { sum: 'succeeded', avg: 'succeeded' } });
    expect(record?.finishedAt).toBe(summary.finishedAt);
  });

  it('previews the plan without running it', () => {
    const { graph, executions } = makeServices();
    graph.addNode('b', 'ADD', params());
    graph.addNode('a', 'ADD', params());
    graph.addNode('c', 'SMA', params('a', 2));
    graph.addEdge('a', 'c');
    expect(executions.plan().stages).toEqual([['a', 'b'], ['c']]);
    expect(executions.list()).toEqual([]);
  });

  it('succeeds trivially on an empty graph', async () => {
    const { executions } = makeServices();
    const summary = await executions.execute();
    expect(summary.status).toBe('succeeded');
    expect(summary.nodes).toEqual([]);
  });

  it('rethrows the fatal error and records the failure', async () => {
    const { graph, executions } = makeServices(
      fakeRegistry(() => {
        throw new Error('unit down');
      }),
      { executorRetryBudget: '2' },
    );
    graph.addNode('a', 'ADD', params());

    await expect(executions.execute()).rejects.toBeInstanceOf(FatalError);
    const [record] = executions.list();
    expect(record.status).toBe('failed');
    expect(record.error).toEqual({
      name: 'FatalError',
      message: 'Execution aborted: node a failed after 2 attempt(s): unit down',
      code: 'FATAL',
    });
    expect(record.summary?.nodes[0]).toMatchObject({ nodeId: 'a', status: 'failed', attempts: 2 });
  });

  it('cancels a background run between stages', async () => {
    const gate = new Deferred();
    const registry = fakeRegistry(async (ctx: OperationContext) => {
      if (ctx.nodeId === 'first') await gate.promise;
      return ctx.nodeId;
    });
    const { graph, executions } = makeServices(registry);
    graph.addNode('first', 'ADD', params());
    graph.addNode('second', 'ADD', params());
    graph.addEdge('first', 'second');

    const record = executions.start();
    expect(record.status).toBe('running');
    await tick();
    expect(record.nodes.first).toBe('running');
    expect(executions.cancel(record.runId)).toBe(true);
    gate.resolve();

    await vi.waitFor(() => expect(record.status).not.toBe('running'));
    const finished = executions.get(record.runId);
    expect(finished?.status).toBe('cancelled');
    expect(finished?.cancelRequested).toBe(true);
    expect(finished?.nodes).toEqual({ first: 'succeeded', second: 'pending' });
    expect(executions.cancel(record.runId)).toBe(false);
  });

  it('answers undefined for unknown runs', () => {
    const { executions } = makeServices();
    expect(executions.get('missing')).toBeUndefined();
    expect(executions.cancel('missing')).toBeUndefined();
  });

  it('keeps only the most recent finished runs', async () => {
    const { executions } = makeServices(defaultRegistry(), { executionHistoryLimit: '2' });
    const ids: string[] = [];
    for (let i = 0; i < 3; i++) ids.push((await executions.execute()).runId);
    expect(executions.list().map((r) => r.runId)).toEqual([ids[2], ids[1]]);
    expect(executions.get(ids[0])).toBeUndefined();
  });
});
