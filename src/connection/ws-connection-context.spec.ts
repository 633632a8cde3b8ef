import WebSocket, { WebSocketServer } from 'ws';
import { WsConnectionContext } from './ws-connection-context';

interface ClientClose {
  code: number;
  reason: string;
}

const setup = async (binaryType: 'nodebuffer' | 'arraybuffer' | 'fragments' = 'nodebuffer') => {
  const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
  const address = wss.address();
  if (address === null || typeof address === 'string') throw new Error(`Unexpected address ${address}`);

  const accepted = new Promise<{ socket: WebSocket; context: WsConnectionContext }>((resolve) => {
    wss.once('connection', (socket: WebSocket) => {
      socket.binaryType = binaryType;
      resolve({ socket, context: new WsConnectionContext(socket, undefined, 'ws-1') });
    });
  });

  const client = new WebSocket(`ws://127.0.0.1:${address.port}`);
  const received: string[] = [];
  client.on('message', (data: WebSocket.RawData) => received.push(String(data)));
  const clientClosed = new Promise<ClientClose>((resolve) => {
    client.once('close', (code: number, reason: Buffer) => resolve({ code, reason: reason.toString() }));
  });
  await new Promise<void>((resolve) => client.once('open', () => resolve()));

  const { socket, context } = await accepted;
  const frames = context.frames()[Symbol.asyncIterator]();

  const teardown = async () => {
    client.terminate();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  };
  return { client, socket, context, frames, received, clientClosed, teardown };
};

describe('WsConnectionContext', () => {
  it('yields text frames as strings', async () => {
    const { client, frames, teardown } = await setup();

    client.send('{"type":"connection_init"}');
    expect(await frames.next()).toEqual({ value: '{"type":"connection_init"}', done: false });

    await teardown();
  });

  it('decodes binary frames as UTF-8', async () => {
    const { client, frames, teardown } = await setup();

    client.send(Buffer.from('{"type":"ka"}', 'utf8'));
    expect(await frames.next()).toEqual({ value: '{"type":"ka"}', done: false });

    await teardown();
  });

  it('joins a fragmented binary message', async () => {
    const { client, frames, teardown } = await setup('fragments');

    client.send(Buffer.from('{"type":', 'utf8'), { binary: true, fin: false });
    client.send(Buffer.from('"ka"}', 'utf8'), { binary: true, fin: true });
    expect(await frames.next()).toEqual({ value: '{"type":"ka"}', done: false });

    await teardown();
  });

  it('decodes array buffers', async () => {
    const { client, frames, teardown } = await setup('arraybuffer');

    client.send(Buffer.from('ok', 'utf8'));
    expect(await frames.next()).toEqual({ value: 'ok', done: false });

    await teardown();
  });

  it('writes frames to the peer', async () => {
    const { client, context, received, teardown } = await setup();
    const delivered = new Promise<void>((resolve) => client.once('message', () => resolve()));

    await context.send('{"type":"connection_ack"}');
    await delivered;
    expect(received).toEqual(['{"type":"connection_ack"}']);

    await teardown();
  });

  it('close waits for the close handshake and ends the inbound frames', async () => {
    const { socket, context, frames, clientClosed, teardown } = await setup();

    await context.close(4400, 'Bad request');

    expect(socket.readyState).toBe(WebSocket.CLOSED);
    expect(context.closed).toBe(true);
    expect(await clientClosed).toEqual({ code: 4400, reason: 'Bad request' });
    expect(await frames.next()).toEqual({ value: undefined, done: true });

    await teardown();
  });

  it('send after close resolves without writing', async () => {
    const { context, received, clientClosed, teardown } = await setup();

    await context.close(1000);
    await context.send('{"type":"ka"}');
    await clientClosed;

    expect(received).toEqual([]);
    await teardown();
  });

  it('ends the inbound frames when the peer hangs up', async () => {
    const { client, frames, teardown } = await setup();

    client.close(1000);
    expect(await frames.next()).toEqual({ value: undefined, done: true });

    await teardown();
  });

  it('ends the inbound frames on a socket error', async () => {
    const { socket, frames, teardown } = await setup();

    socket.emit('error', new Error('connection reset'));
    expect(await frames.next()).toEqual({ value: undefined, done: true });

    await teardown();
  });
});
