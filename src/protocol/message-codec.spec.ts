import { decode, encode } from './message-codec';
import { OperationMessage } from './operation-message.types';
import { MessageType } from './protocol.constants';
import { DecodeError } from './protocol.errors';

describe('message codec', () => {
  describe('encode', () => {
    it('writes type, id and payload in that order', () => {
      const frame = encode({ type: MessageType.Data, id: '1', payload: { data: { n: 1 } } });
      expect(frame).toBe('{"type":"data","id":"1","payload":{"data":{"n":1}}}');
    });

    it('omits absent id and payload', () => {
      expect(encode({ type: MessageType.ConnectionAck })).toBe('{"type":"connection_ack"}');
      expect(encode({ type: MessageType.KeepAlive })).toBe('{"type":"ka"}');
      expect(encode({ type: MessageType.Complete, id: '7' })).toBe('{"type":"complete","id":"7"}');
    });

    it('drops an undefined connection_init payload', () => {
      expect(encode({ type: MessageType.ConnectionInit, payload: undefined })).toBe(
        '{"type":"connection_init"}',
      );
    });
  });

  describe('decode', () => {
    it('decodes a start message', () => {
      const message = decode(
        '{"type":"start","id":"1","payload":{"query":"{ a }","variables":{"x":1},"operationName":"Q"}}',
      );
      expect(message).toEqual({
        type: MessageType.Start,
        id: '1',
        payload: { query: '{ a }', variables: { x: 1 }, operationName: 'Q' },
      });
    });

    it('drops null variables and operationName', () => {
      const message = decode(
        '{"type":"start","id":"1","payload":{"query":"{ a }","variables":null,"operationName":null}}',
      );
      expect(message).toEqual({ type: MessageType.Start, id: '1', payload: { query: '{ a }' } });
    });

    it('accepts binary frames', () => {
      expect(decode(Buffer.from('{"type":"stop","id":"3"}'))).toEqual({ type: MessageType.Stop, id: '3' });
    });

    it('returns frozen messages', () => {
      expect(Object.isFrozen(decode('{"type":"connection_terminate"}'))).toBe(true);
    });

    it('ignores unknown keys', () => {
      expect(decode('{"type":"stop","id":"3","extra":true}')).toEqual({ type: MessageType.Stop, id: '3' });
    });

    it('treats a null connection_init payload as absent', () => {
      expect(decode('{"type":"connection_init","payload":null}')).toEqual({
        type: MessageType.ConnectionInit,
        payload: undefined,
      });
    });

    it.each([
      ['not json', 'Message is not valid JSON'],
      ['[1,2]', 'Message must be a JSON object'],
      ['{"id":"1"}', 'Message type is missing'],
      ['{"type":"subscribe","id":"1"}', 'Unknown message type: subscribe'],
      ['{"type":"stop","id":1}', 'Message id must be a string'],
      ['{"type":"stop"}', '"stop" message requires an id'],
      ['{"type":"start","id":"1"}', '"start" payload must be an object'],
      ['{"type":"start","id":"1","payload":{}}', '"start" payload requires a query'],
      ['{"type":"start","payload":{"query":"{ a }"}}', '"start" message requires an id'],
      ['{"type":"start","id":"1","payload":{"query":"{ a }","variables":[]}}', '"variables" must be an object'],
      ['{"type":"start","id":"1","payload":{"query":"{ a }","operationName":5}}', '"operationName" must be a string'],
      ['{"type":"connection_init","payload":"token"}', '"connection_init" payload must be an object'],
      ['{"type":"error","id":"1","payload":{"message":"x"}}', '"error" payload must be a list of errors'],
      ['{"type":"data","id":"1","payload":{"errors":[{}]}}', '"data" payload errors must be a list of errors'],
    ])('rejects %s', (frame, reason) => {
      expect(() => decode(frame)).toThrow(new DecodeError(reason));
    });
  });

  describe('round trip', () => {
    const messages: OperationMessage[] = [
      { type: MessageType.ConnectionInit, payload: { authToken: 'test-token' } },
      { type: MessageType.ConnectionAck },
      { type: MessageType.ConnectionError, payload: { message: 'Connection rejected' } },
      { type: MessageType.ConnectionTerminate },
      { type: MessageType.KeepAlive },
      { type: MessageType.Start, id: '1', payload: { query: 'subscription { tick }', variables: { a: 1 } } },
      { type: MessageType.Data, id: '1', payload: { data: { tick: 1 }, errors: [{ message: 'partial' }] } },
      { type: MessageType.Error, id: '1', payload: [{ message: 'bad', locations: [{ line: 1, column: 3 }] }] },
      { type: MessageType.Complete, id: '1' },
      { type: MessageType.Stop, id: '1' },
    ];

    it.each(messages.map((message): [string, OperationMessage] => [message.type, message]))('preserves %s', (_type, message) => {
      const frame = encode(message);
      expect(decode(frame)).toEqual(message);
      expect(encode(decode(frame))).toBe(frame);
    });
  });
});
