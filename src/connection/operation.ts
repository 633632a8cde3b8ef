import { ResultStream } from '../execution/execution.types';
import { StartPayload } from '../protocol/operation-message.types';

/** One in-flight query, mutation or subscription on a connection. */
export class Operation {
  private stream: ResultStream | null = null;
  private cancelled = false;

  constructor(
    readonly id: string,
    readonly payload: StartPayload,
  ) {}

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Take ownership of the result stream. If the operation was cancelled
   * while the engine was still setting it up, the stream is closed at once.
   *
   * @returns `false` when the stream was rejected.
   */
  async adopt(stream: ResultStream): Promise<boolean> {
    if (this.cancelled) {
      await stream.return();
      return false;
    }
    this.stream = stream;
    return true;
  }

  /** Idempotent; the underlying stream is released at most once. */
  async cancel(): Promise<void> {
    if (this.cancelled) return;
    this.cancelled = true;
    const stream = this.stream;
    this.stream = null;
    if (stream) await stream.return();
  }
}
