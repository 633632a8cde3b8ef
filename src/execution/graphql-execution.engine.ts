import { Inject, Injectable } from '@nestjs/common';
import {
  DocumentNode,
  ExecutionArgs,
  ExecutionResult,
  GraphQLError,
  GraphQLSchema,
  execute,
  getOperationAST,
  parse,
  subscribe,
  validate,
} from 'graphql';
import { ExecutionPayload } from '../protocol/operation-message.types';
import { ExecutionError } from '../protocol/protocol.errors';
import { GRAPHQL_SCHEMA } from './execution.constants';
import { ExecutionEngine, ExecutionOutcome, ExecutionRequest, ResultStream } from './execution.types';

export function toExecutionPayload(result: ExecutionResult): ExecutionPayload {
  return {
    ...(result.data !== undefined ? { data: result.data } : {}),
    ...(result.errors ? { errors: result.errors.map((error) => error.toJSON()) } : {}),
    ...(result.extensions ? { extensions: result.extensions } : {}),
  };
}

function isResultGenerator(
  value: AsyncGenerator<ExecutionResult, void, void> | ExecutionResult,
): value is AsyncGenerator<ExecutionResult, void, void> {
  return Symbol.asyncIterator in value;
}

/**
 * Maps each result of a graphql-js subscription to its wire payload.
 * `return()` goes straight to the source so a pending `next()` settles.
 */
function mapResults(source: AsyncGenerator<ExecutionResult, void, void>): ResultStream {
  const map = (step: IteratorResult<ExecutionResult, void>): IteratorResult<ExecutionPayload> =>
    step.done ? { value: undefined, done: true } : { value: toExecutionPayload(step.value), done: false };

  return {
    next: () => source.next().then(map),
    return: () => source.return().then(map),
  };
}

/** {@link ExecutionEngine} backed by graphql-js against the application schema. */
@Injectable()
export class GraphqlExecutionEngine implements ExecutionEngine {
  constructor(@Inject(GRAPHQL_SCHEMA) private readonly schema: GraphQLSchema) {}

  async execute(request: ExecutionRequest): Promise<ExecutionOutcome> {
    const document = this.parse(request.query);

    const validationErrors = validate(this.schema, document);
    if (validationErrors.length) {
      throw new ExecutionError(validationErrors.map((error) => error.toJSON()));
    }

    const args: ExecutionArgs = {
      schema: this.schema,
      document,
      variableValues: request.variables,
      operationName: request.operationName,
      contextValue: request.contextValue,
    };

    const operation = getOperationAST(document, request.operationName);
    if (operation?.operation === 'subscription') {
      const result = await subscribe(args);
      if (isResultGenerator(result)) {
        return { kind: 'stream', results: mapResults(result) };
      }
      throw new ExecutionError(result.errors?.map((error) => error.toJSON()) ?? []);
    }

    return { kind: 'single', result: toExecutionPayload(await execute(args)) };
  }

  private parse(query: string): DocumentNode {
    try {
      return parse(query);
    } catch (err) {
      if (err instanceof GraphQLError) throw new ExecutionError([err.toJSON()]);
      throw err;
    }
  }
}
