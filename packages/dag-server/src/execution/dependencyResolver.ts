import { Injectable } from '@nestjs/common';

import { ConsistencyError } from '../graph/errors';
import type { GraphView } from '../shared/types/graph.types';
import type { PlannedNode, StagedPlan } from './execution.types';

// Code-unit order, independent of locale.
export const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Kahn's algorithm grouped into stages: stage 0 holds every node without
 * predecessors, stage i+1 every node whose last predecessor sits in stage i.
 */
@Injectable()
export class DependencyResolver {
  resolve(graph: GraphView): StagedPlan {
    const remaining = new Map<string, number>();
    for (const id of graph.nodeIds()) remaining.set(id, graph.inDegree(id));

    const stages: string[][] = [];
    const stageOf = new Map<string, number>();
    let current = Array.from(remaining.entries())
      .filter(([, degree]) => degree === 0)
      .map(([id]) => id)
      .sort(compareIds);

    while (current.length > 0) {
      const index = stages.length;
      stages.push(current);
      const next: string[] = [];
      for (const id of current) {
        stageOf.set(id, index);
        for (const successor of graph.successors(id)) {
          const degree = (remaining.get(successor) ?? 0) - 1;
          remaining.set(successor, degree);
          if (degree === 0) next.push(successor);
        }
      }
      current = next.sort(compareIds);
    }

    if (stageOf.size < graph.nodeCount) {
      const unplaced = graph.nodeIds().filter((id) => !stageOf.has(id)).sort(compareIds);
      throw new ConsistencyError(unplaced);
    }

    const nodes = new Map<string, PlannedNode>();
    for (const stage of stages) {
      for (const id of stage) {
        const node = graph.getNode(id);
        if (!node) throw new ConsistencyError([id]);
        nodes.set(
          id,
          Object.freeze({
            ...node,
            stage: stageOf.get(id) ?? 0,
            predecessors: Object.freeze(graph.predecessors(id).sort(compareIds)),
          }),
        );
      }
    }

    return Object.freeze({
      version: graph.version,
      stages: Object.freeze(stages.map((stage) => Object.freeze(stage))),
      nodes,
    });
  }
}
