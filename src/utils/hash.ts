import * as crypto from 'crypto';

/**
 * Generate a unique job id
 * Uses item id + timestamp + random bytes so re-queuing the same item gets a fresh id
 */
export function generateJobId(itemId: string): string {
  const data = `${itemId}:${Date.now()}:${crypto.randomBytes(8).toString('hex')}`;
  return crypto.createHash('sha1').update(data).digest('hex').slice(0, 16);
}
