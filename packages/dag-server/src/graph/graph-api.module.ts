import { Module } from '@nestjs/common';

import { GraphCoreModule } from '../graph-core/graph-core.module';
import { ExecutionController } from './controllers/execution.controller';
import { GraphController } from './controllers/graph.controller';

@Module({
  imports: [GraphCoreModule],
  controllers: [GraphController, ExecutionController],
})
export class GraphApiModule {}
