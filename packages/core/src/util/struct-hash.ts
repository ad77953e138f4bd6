import { createHash } from 'node:crypto';

/** sha256 hex digest of bytes or text. */
export function sha256Hex(input: Uint8Array | string): string {
  return createHash('sha256').update(input).digest('hex');
}
