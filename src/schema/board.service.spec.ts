import { EventEmitter2 } from '@nestjs/event-emitter';
import { BOARD_POSTED, BoardService } from './board.service';

describe('BoardService', () => {
  it('stores posts and publishes them', () => {
    const events = new EventEmitter2();
    const published: string[] = [];
    events.on(BOARD_POSTED, (text: string) => published.push(text));
    const board = new BoardService(events);

    expect(board.post('one')).toBe('one');
    board.post('two');

    expect(board.list()).toEqual(['one', 'two']);
    expect(published).toEqual(['one', 'two']);
  });

  it('watch yields posts made after it started', async () => {
    const board = new BoardService(new EventEmitter2());
    board.post('before');

    const watcher = board.watch();
    board.post('after');

    expect(await watcher.next()).toEqual({ value: 'after', done: false });
    await watcher.return();
    expect(board.watcherCount).toBe(0);
  });
});
