import { Buffer } from 'node:buffer';
import type { Base64Port } from '../../../ports/base64.port.js';

/**
 * Node base64 adapter using Buffer (Node-specific, hidden behind port).
 */
export class NodeBase64 implements Base64Port {
  encodeBase64(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('base64');
  }
}
