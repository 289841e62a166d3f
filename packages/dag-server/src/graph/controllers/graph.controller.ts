import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Post, Put } from '@nestjs/common';
import { z } from 'zod';

import { ExecutionService } from '../../execution/execution.service';
import { OperationRegistry } from '../../graph-core/operationRegistry';
import type { OperationSchema } from '../../operations/operation.types';
import type { GraphDocument, GraphNode, ParamList } from '../../shared/types/graph.types';
import { ParamEntrySchema } from '../graph.document';
import { GraphService, type ImportResult } from '../graph.service';
import { toParamList } from '../parameters';
import { badPayload, toHttpException } from './http.errors';

const AddNodeSchema = z.object({
  id: z.string(),
  type: z.string(),
  parameters: z.array(ParamEntrySchema).default([]),
});

const AddEdgeSchema = z.object({ source: z.string(), target: z.string() });

type NodeBody = { id: string; type: string; parameters: ParamList };

const toNodeBody = (node: GraphNode): NodeBody => ({
  id: node.id,
  type: node.kind,
  parameters: toParamList(node.parameters),
});

@Controller('api/graph')
export class GraphController {
  constructor(
    @Inject(OperationRegistry) private readonly registry: OperationRegistry,
    @Inject(GraphService) private readonly graph: GraphService,
    @Inject(ExecutionService) private readonly executions: ExecutionService,
  ) {}

  @Get('operations')
  getOperations(): OperationSchema[] {
    return this.registry.toSchema();
  }

  @Get()
  getGraph(): GraphDocument & { version: number } {
    return { version: this.graph.version, ...this.graph.exportGraph() };
  }

  @Put()
  putGraph(@Body() body: unknown): ImportResult {
    try {
      return this.graph.importGraph(body);
    } catch (e: unknown) {
      throw toHttpException(e);
    }
  }

  @Post('nodes')
  @HttpCode(201)
  addNode(@Body() body: unknown): NodeBody & { version: number } {
    const parsed = AddNodeSchema.safeParse(body);
    if (!parsed.success) throw badPayload(parsed.error);
    try {
      const node = this.graph.addNode(parsed.data.id, parsed.data.type, parsed.data.parameters);
      return { ...toNodeBody(node), version: this.graph.version };
    } catch (e: unknown) {
      throw toHttpException(e);
    }
  }

  @Delete('nodes/:nodeId')
  removeNode(@Param('nodeId') nodeId: string): { removed: boolean; version: number } {
    const removed = this.graph.removeNode(nodeId);
    return { removed, version: this.graph.version };
  }

  @Post('edges')
  @HttpCode(201)
  addEdge(@Body() body: unknown): { source: string; target: string; added: boolean; version: number } {
    const parsed = AddEdgeSchema.safeParse(body);
    if (!parsed.success) throw badPayload(parsed.error);
    const { source, target } = parsed.data;
    try {
      const added = this.graph.addEdge(source, target);
      return { source, target, added, version: this.graph.version };
    } catch (e: unknown) {
      throw toHttpException(e);
    }
  }

  @Delete('edges/:source/:target')
  removeEdge(
    @Param('source') source: string,
    @Param('target') target: string,
  ): { removed: boolean; version: number } {
    const removed = this.graph.removeEdge(source, target);
    return { removed, version: this.graph.version };
  }

  @Get('plan')
  getPlan(): { version: number; stages: string[][] } {
    try {
      const plan = this.executions.plan();
      return { version: plan.version, stages: plan.stages.map((stage) => [...stage]) };
    } catch (e: unknown) {
      throw toHttpException(e);
    }
  }

  @Post('save')
  @HttpCode(200)
  async save(): Promise<{ path: string; nodes: number; edges: number }> {
    try {
      return await this.graph.save();
    } catch (e: unknown) {
      throw toHttpException(e);
    }
  }

  @Post('load')
  @HttpCode(200)
  async load(): Promise<{ applied: boolean } & Partial<ImportResult>> {
    try {
      return await this.graph.load();
    } catch (e: unknown) {
      throw toHttpException(e);
    }
  }
}
