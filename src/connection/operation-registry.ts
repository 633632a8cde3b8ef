import { DuplicateOperationIdError } from '../protocol/protocol.errors';
import { Operation } from './operation';

/** Operations of a single connection, keyed by client-chosen id. */
export class OperationRegistry {
  private readonly operations = new Map<string, Operation>();

  get size(): number {
    return this.operations.size;
  }

  /** @throws {DuplicateOperationIdError} if the id is already live. */
  register(id: string, operation: Operation): void {
    if (this.operations.has(id)) throw new DuplicateOperationIdError(id);
    this.operations.set(id, operation);
  }

  lookup(id: string): Operation | undefined {
    return this.operations.get(id);
  }

  remove(id: string): boolean {
    return this.operations.delete(id);
  }

  /** Remove and return every operation, in registration order. */
  drain(): Operation[] {
    const operations = [...this.operations.values()];
    this.operations.clear();
    return operations;
  }
}
