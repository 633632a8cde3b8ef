/** WebSocket sub-protocol negotiated with `subscriptions-transport-ws` clients. */
export const WS_PROTOCOL = 'graphql-ws';

export enum MessageType {
  ConnectionInit = 'connection_init',
  ConnectionAck = 'connection_ack',
  ConnectionError = 'connection_error',
  ConnectionTerminate = 'connection_terminate',
  KeepAlive = 'ka',
  Start = 'start',
  Data = 'data',
  Error = 'error',
  Complete = 'complete',
  Stop = 'stop',
}

/** Close codes used when the server ends a connection. */
export enum CloseCode {
  Normal = 1000,
  ProtocolMismatch = 1002,
  InternalError = 1011,
  BadRequest = 4400,
  Unauthorized = 4401,
  Forbidden = 4403,
  ConnectionInitTimeout = 4408,
}
