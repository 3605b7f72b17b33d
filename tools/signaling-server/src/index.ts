// Relay for parley signaling: nodes register by id and exchange `signal`
// messages. It forwards payloads without reading them.

export const SIGNALING_SERVER_VERSION = '0.1.0';

export type { Participant, RelayMessage } from 'parley-protocol';

export { createSignalingServer, startSignalingServer } from './server.js';
export { DEFAULT_PORT, resolveServerConfig } from './config.js';
export type { SignalingServerConfig } from './config.js';
export type { SignalingServer, SignalingServerOptions } from './server.js';
