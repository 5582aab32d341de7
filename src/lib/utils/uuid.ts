/**
 * UUID v7 generator: ids sort by creation millisecond. Ids from the same
 * millisecond order randomly, so FIFO ties are broken by `created_at` first.
 */

import { randomBytes } from 'crypto';

/**
 * Layout: 48-bit unix ms timestamp | version 7 | 12 random bits | variant 10 | 62 random bits
 */
export function generateUUIDv7(now: number = Date.now()): string {
  const bytes = randomBytes(16);

  let timestamp = Math.max(0, Math.floor(now));
  for (let i = 5; i >= 0; i--) {
    bytes[i] = timestamp % 256;
    timestamp = Math.floor(timestamp / 256);
  }

  bytes[6] = 0x70 | (bytes[6] & 0x0f);
  bytes[8] = 0x80 | (bytes[8] & 0x3f);

  const hex = bytes.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

