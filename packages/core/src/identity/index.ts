export type { NodeId } from './node-id.js';
export { NODE_ID_BYTES, bytesToHex, generateNodeId, randomHex } from './node-id.js';
