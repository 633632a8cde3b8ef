import { Injectable } from '@nestjs/common';

/** What the directory needs from a live connection. */
export interface ManagedConnection {
  readonly id: string;
  readonly operationCount: number;
  terminate(code?: number, reason?: string): Promise<void>;
}

/**
 * Process-scoped directory of live connections, used for health reporting
 * and shutdown. It does not own the connections: each one removes itself
 * when its transport closes.
 */
@Injectable()
export class ConnectionDirectory {
  private readonly connections = new Map<string, ManagedConnection>();

  add(connection: ManagedConnection): void {
    this.connections.set(connection.id, connection);
  }

  remove(connection: ManagedConnection): void {
    if (this.connections.get(connection.id) === connection) {
      this.connections.delete(connection.id);
    }
  }

  get(id: string): ManagedConnection | undefined {
    return this.connections.get(id);
  }

  /** Copy of the live set, safe to iterate while connections close. */
  snapshot(): ManagedConnection[] {
    return [...this.connections.values()];
  }

  get size(): number {
    return this.connections.size;
  }

  get operationCount(): number {
    let total = 0;
    for (const connection of this.connections.values()) total += connection.operationCount;
    return total;
  }
}
