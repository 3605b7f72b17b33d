import nacl from 'tweetnacl';

export type NodeId = string;

/** Bytes of entropy in generated node ids and role nonces */
export const NODE_ID_BYTES = 16;

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

export function randomHex(byteLength: number): string {
  return bytesToHex(nacl.randomBytes(byteLength));
}

export function generateNodeId(): NodeId {
  return randomHex(NODE_ID_BYTES);
}
