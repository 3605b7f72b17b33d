export type {
  Role,
  SignalingState,
  DescriptionType,
  SessionDescription,
  ConnectivityCandidate,
  DescriptionMessage,
  CandidateMessage,
  SignalingMessage,
} from './signal.js';
export {
  DESCRIPTION_TYPES,
  isDescriptionType,
  isSessionDescription,
  isConnectivityCandidate,
  isSignalingMessage,
  isDescriptionMessage,
} from './signal.js';
export type { Participant, RelayMessage, RelayMessageType } from './relay.js';
export { isRelayMessage, isRelayMessageType } from './relay.js';
