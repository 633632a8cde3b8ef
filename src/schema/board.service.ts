import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AsyncQueue } from '../connection/async-queue';

export const BOARD_POSTED = 'board.posted';

/**
 * In-memory message board behind the sample schema. New posts are
 * published on `board.posted`; {@link watch} turns that event into an
 * async iterator for subscription resolvers.
 */
@Injectable()
export class BoardService {
  private readonly logger = new Logger(BoardService.name);
  private readonly messages: string[] = [];

  constructor(private readonly events: EventEmitter2) {}

  list(): string[] {
    return [...this.messages];
  }

  post(text: string): string {
    this.messages.push(text);
    this.events.emit(BOARD_POSTED, text);
    return text;
  }

  /** Stream of posts made after the call. The listener is removed on `return()`. */
  watch(): AsyncQueue<string> {
    const listener = (text: string) => {
      queue.push(text);
    };
    const queue = new AsyncQueue<string>(() => {
      this.events.off(BOARD_POSTED, listener);
      this.logger.debug(`Watcher released (${this.events.listenerCount(BOARD_POSTED)} left)`);
    });
    this.events.on(BOARD_POSTED, listener);
    return queue;
  }

  get watcherCount(): number {
    return this.events.listenerCount(BOARD_POSTED);
  }
}
