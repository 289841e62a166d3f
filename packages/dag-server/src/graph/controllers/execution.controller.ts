import { Body, Controller, Get, HttpCode, HttpException, HttpStatus, Inject, Param, Post } from '@nestjs/common';
import { z } from 'zod';

import { ExecutionService, type ExecuteRequest, type RunRecord } from '../../execution/execution.service';
import type { ExecutionSummary } from '../../execution/execution.types';
import { badPayload, toHttpException } from './http.errors';

const positiveInt = z.number().int().min(1);

const ExecuteSchema = z
  .object({
    dataset: z.record(z.string(), z.array(z.number())).optional(),
    concurrency: positiveInt.optional(),
    retryBudget: positiveInt.optional(),
    retryDelayMs: z.number().int().min(0).optional(),
  })
  .strict();

const runNotFound = (runId: string) =>
  new HttpException({ error: 'RUN_NOT_FOUND', message: `Run ${runId} not found` }, HttpStatus.NOT_FOUND);

@Controller('api/executions')
export class ExecutionController {
  constructor(@Inject(ExecutionService) private readonly executions: ExecutionService) {}

  @Post('run')
  @HttpCode(200)
  async run(@Body() body: unknown): Promise<ExecutionSummary> {
    const request = this.parse(body);
    try {
      return await this.executions.execute(request);
    } catch (e: unknown) {
      throw toHttpException(e);
    }
  }

  @Post()
  @HttpCode(202)
  start(@Body() body: unknown): { runId: string } {
    const request = this.parse(body);
    try {
      const record = this.executions.start(request);
      return { runId: record.runId };
    } catch (e: unknown) {
      throw toHttpException(e);
    }
  }

  @Get()
  list(): RunRecord[] {
    return this.executions.list();
  }

  @Get(':runId')
  get(@Param('runId') runId: string): RunRecord {
    const record = this.executions.get(runId);
    if (!record) throw runNotFound(runId);
    return record;
  }

  @Post(':runId/cancel')
  @HttpCode(200)
  cancel(@Param('runId') runId: string): { runId: string; cancelled: boolean } {
    const cancelled = this.executions.cancel(runId);
    if (cancelled === undefined) throw runNotFound(runId);
    return { runId, cancelled };
  }

  // An absent body means "all defaults".
  private parse(body: unknown): ExecuteRequest {
    const parsed = ExecuteSchema.safeParse(body ?? {});
    if (!parsed.success) throw badPayload(parsed.error);
    return parsed.data;
  }
}
