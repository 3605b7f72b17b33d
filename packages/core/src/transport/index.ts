export { createMemoryChannelPair } from './signaling-channel.js';
export type { SignalingChannel } from './signaling-channel.js';
export { encodeSignal, decodeSignal } from './signal-codec.js';
