export { PARLEY_PROTOCOL_VERSION } from 'parley-protocol';
export { ParleyClient } from './parley-client.js';
export type {
  ParleyClientOptions,
  ParticipantHandler,
  StatusHandler,
  NegotiationErrorHandler,
} from './parley-client.js';
