import { createHmac } from 'node:crypto';
import type { HmacSha256Port } from '../../../ports/hmac-sha256.port.js';

export class NodeHmacSha256 implements HmacSha256Port {
  hmacSha256(key: Uint8Array, message: Uint8Array): Uint8Array {
    const out = createHmac('sha256', Buffer.from(key)).update(Buffer.from(message)).digest();
    return new Uint8Array(out);
  }
}
