import {
  ConnectionParams,
  ExecutionPayload,
  FormattedError,
  OperationMessage,
  StartPayload,
} from './operation-message.types';
import { MessageType } from './protocol.constants';
import { DecodeError } from './protocol.errors';

const MESSAGE_TYPES: ReadonlySet<string> = new Set(Object.values(MessageType));

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isMessageType(value: string): value is MessageType {
  return MESSAGE_TYPES.has(value);
}

function isFormattedError(value: unknown): value is FormattedError {
  return isRecord(value) && typeof value.message === 'string';
}

/**
 * Serialize a message to its wire form. Keys are written in the order
 * `type`, `id`, `payload`; absent ones are left out.
 */
export function encode(message: OperationMessage): string {
  const wire: { type: MessageType; id?: string; payload?: unknown } = { type: message.type };
  if ('id' in message) wire.id = message.id;
  if ('payload' in message && message.payload !== undefined) wire.payload = message.payload;
  return JSON.stringify(wire);
}

/**
 * Parse and validate a wire frame.
 *
 * @throws {DecodeError} when the frame is not JSON, the type is missing or
 *         unknown, or a field the type requires is absent or mistyped.
 */
export function decode(frame: string | Buffer): OperationMessage {
  const text = typeof frame === 'string' ? frame : frame.toString('utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new DecodeError('Message is not valid JSON');
  }

  if (!isRecord(raw)) throw new DecodeError('Message must be a JSON object');
  const { type, id, payload } = raw;

  if (typeof type !== 'string') throw new DecodeError('Message type is missing');
  if (!isMessageType(type)) throw new DecodeError(`Unknown message type: ${type}`);
  if (id !== undefined && typeof id !== 'string') {
    throw new DecodeError('Message id must be a string');
  }

  return Object.freeze(toMessage(type, id, payload));
}

function requireId(type: MessageType, id: string | undefined): string {
  if (id === undefined) throw new DecodeError(`"${type}" message requires an id`);
  return id;
}

function toMessage(type: MessageType, id: string | undefined, payload: unknown): OperationMessage {
  switch (type) {
    case MessageType.ConnectionInit:
      return { type, payload: toConnectionParams(payload) };
    case MessageType.ConnectionAck:
    case MessageType.ConnectionTerminate:
    case MessageType.KeepAlive:
      return { type };
    case MessageType.ConnectionError: {
      if (!isRecord(payload)) throw new DecodeError('"connection_error" payload must be an object');
      const message = typeof payload.message === 'string' ? payload.message : 'Connection error';
      return { type, payload: { ...payload, message } };
    }
    case MessageType.Start:
      return { type, id: requireId(type, id), payload: toStartPayload(payload) };
    case MessageType.Data:
      if (!isRecord(payload)) throw new DecodeError('"data" payload must be an object');
      return { type, id: requireId(type, id), payload: toExecutionPayload(payload) };
    case MessageType.Error:
      return {
        type,
        id: requireId(type, id),
        payload: toErrorList(payload, '"error" payload must be a list of errors'),
      };
    case MessageType.Complete:
    case MessageType.Stop:
      return { type, id: requireId(type, id) };
  }
}

function toConnectionParams(payload: unknown): ConnectionParams | undefined {
  if (payload === undefined || payload === null) return undefined;
  if (!isRecord(payload)) throw new DecodeError('"connection_init" payload must be an object');
  return payload;
}

function toStartPayload(payload: unknown): StartPayload {
  if (!isRecord(payload)) throw new DecodeError('"start" payload must be an object');
  const { query, variables, operationName } = payload;

  if (typeof query !== 'string') throw new DecodeError('"start" payload requires a query');
  if (variables !== undefined && variables !== null && !isRecord(variables)) {
    throw new DecodeError('"variables" must be an object');
  }
  if (operationName !== undefined && operationName !== null && typeof operationName !== 'string') {
    throw new DecodeError('"operationName" must be a string');
  }

  return {
    query,
    ...(isRecord(variables) ? { variables } : {}),
    ...(typeof operationName === 'string' ? { operationName } : {}),
  };
}

function toExecutionPayload(payload: Record<string, unknown>): ExecutionPayload {
  const { data, errors, extensions } = payload;
  if (extensions !== undefined && !isRecord(extensions)) {
    throw new DecodeError('"data" payload extensions must be an object');
  }
  return {
    ...(data !== undefined ? { data } : {}),
    ...(errors !== undefined
      ? { errors: toErrorList(errors, '"data" payload errors must be a list of errors') }
      : {}),
    ...(isRecord(extensions) ? { extensions } : {}),
  };
}

function toErrorList(value: unknown, reason: string): FormattedError[] {
  if (!Array.isArray(value)) throw new DecodeError(reason);
  const errors: FormattedError[] = [];
  for (const item of value) {
    if (!isFormattedError(item)) throw new DecodeError(reason);
    errors.push(item);
  }
  return errors;
}
