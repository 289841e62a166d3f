import { Global, Module } from '@nestjs/common';

import { CoreModule } from '../core/core.module';
import { DependencyResolver } from '../execution/dependencyResolver';
import { ExecutionService } from '../execution/execution.service';
import { Executor } from '../execution/executor';
import { GraphService } from '../graph/graph.service';
import { GraphFileRepository } from '../graph/graphFile.repository';
import { OPERATION_UNITS } from '../operations/operation.types';
import { DEFAULT_OPERATION_UNITS } from '../operations/units';

import { OperationRegistry } from './operationRegistry';

@Global()
@Module({
  imports: [CoreModule],
  providers: [
    { provide: OPERATION_UNITS, useValue: DEFAULT_OPERATION_UNITS },
    OperationRegistry,
    GraphFileRepository,
    GraphService,
    DependencyResolver,
    Executor,
    ExecutionService,
  ],
  exports: [CoreModule, OperationRegistry, GraphService, DependencyResolver, Executor, ExecutionService],
})
export class GraphCoreModule {}
