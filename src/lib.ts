export { SmppClient, type SessionState, type SmppClientEvents } from './smpp/client.js';
export type { Bind, BindMode, ReceiveMessage, SendMessage, SendMessageAck, SubmitResult } from './smpp/commands.js';
export {
  SmppClientError,
  ConnectionFailedError,
  BindFailedError,
  SessionClosedError,
  AlreadyBoundError,
  RequestTimeoutError,
  DuplicateSequenceError,
} from './smpp/errors.js';
export { did, didEquals, TypeOfNumber, NumberingPlan, type Did } from './protocol/address.js';
export { CommandStatus, describeStatus } from './protocol/command-status.js';
export type { Pdu, OutboundPdu } from './protocol/pdu.js';
export { SmppTransport } from './transport/smpp-transport.js';
export type { Endpoint, PduTransport, PduConnection, ConnectionListener } from './transport/types.js';
export type { SessionConfigInput } from './config/schema.js';
