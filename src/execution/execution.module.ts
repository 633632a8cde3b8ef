import { Module } from '@nestjs/common';
import { SchemaModule } from '../schema/schema.module';
import { EXECUTION_ENGINE } from './execution.constants';
import { GraphqlExecutionEngine } from './graphql-execution.engine';

@Module({
  imports: [SchemaModule],
  providers: [{ provide: EXECUTION_ENGINE, useClass: GraphqlExecutionEngine }],
  exports: [EXECUTION_ENGINE],
})
export class ExecutionModule {}
