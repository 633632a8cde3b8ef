import { Module } from '@nestjs/common';
import { GRAPHQL_SCHEMA } from '../execution/execution.constants';
import { createBoardSchema } from './board.schema';
import { BoardService } from './board.service';

@Module({
  providers: [
    BoardService,
    { provide: GRAPHQL_SCHEMA, useFactory: createBoardSchema, inject: [BoardService] },
  ],
  exports: [BoardService, GRAPHQL_SCHEMA],
})
export class SchemaModule {}
