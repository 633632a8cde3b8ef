import { ExecutionPayload } from '../protocol/operation-message.types';

export interface ExecutionRequest {
  readonly query: string;
  readonly variables?: Readonly<Record<string, unknown>>;
  readonly operationName?: string;
  /** Value returned by the `onConnect` hook for this connection. */
  readonly contextValue: unknown;
}

/** Lazy sequence of results for a subscription. `return()` releases it. */
export interface ResultStream extends AsyncIterator<ExecutionPayload> {
  return(): Promise<IteratorResult<ExecutionPayload>>;
}

export type ExecutionOutcome =
  | { readonly kind: 'single'; readonly result: ExecutionPayload }
  | { readonly kind: 'stream'; readonly results: ResultStream };

/**
 * The GraphQL engine as the subscription server sees it. Implementations
 * reject with `ExecutionError` for documents that cannot run.
 */
export interface ExecutionEngine {
  execute(request: ExecutionRequest): Promise<ExecutionOutcome>;
}
