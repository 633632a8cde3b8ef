import { MessageType } from './protocol.constants';

/** Arbitrary JSON object carried by `connection_init`. */
export type ConnectionParams = Readonly<Record<string, unknown>>;

export interface StartPayload {
  readonly query: string;
  readonly variables?: Readonly<Record<string, unknown>>;
  readonly operationName?: string;
}

/** JSON shape of a GraphQL error as it travels on the wire. */
export interface FormattedError {
  readonly message: string;
  readonly locations?: ReadonlyArray<{ readonly line: number; readonly column: number }>;
  readonly path?: ReadonlyArray<string | number>;
  readonly extensions?: Readonly<Record<string, unknown>>;
}

export interface ExecutionPayload {
  readonly data?: unknown;
  readonly errors?: readonly FormattedError[];
  readonly extensions?: Readonly<Record<string, unknown>>;
}

export interface ConnectionInitMessage {
  readonly type: MessageType.ConnectionInit;
  readonly payload?: ConnectionParams;
}

export interface ConnectionAckMessage {
  readonly type: MessageType.ConnectionAck;
}

export interface ConnectionErrorMessage {
  readonly type: MessageType.ConnectionError;
  readonly payload: { readonly message: string; readonly [key: string]: unknown };
}

export interface ConnectionTerminateMessage {
  readonly type: MessageType.ConnectionTerminate;
}

export interface KeepAliveMessage {
  readonly type: MessageType.KeepAlive;
}

export interface StartMessage {
  readonly type: MessageType.Start;
  readonly id: string;
  readonly payload: StartPayload;
}

export interface DataMessage {
  readonly type: MessageType.Data;
  readonly id: string;
  readonly payload: ExecutionPayload;
}

export interface ErrorMessage {
  readonly type: MessageType.Error;
  readonly id: string;
  readonly payload: readonly FormattedError[];
}

export interface CompleteMessage {
  readonly type: MessageType.Complete;
  readonly id: string;
}

export interface StopMessage {
  readonly type: MessageType.Stop;
  readonly id: string;
}

export type ClientMessage =
  | ConnectionInitMessage
  | StartMessage
  | StopMessage
  | ConnectionTerminateMessage;

export type ServerMessage =
  | ConnectionAckMessage
  | ConnectionErrorMessage
  | KeepAliveMessage
  | DataMessage
  | ErrorMessage
  | CompleteMessage;

export type OperationMessage = ClientMessage | ServerMessage;
