import { randomUUID } from 'node:crypto';
import type { Id } from '@nodeset/protocol';

/**
 * Generate a fresh node identifier (UUID v4).
 */
export function generateId(): Id {
  return randomUUID();
}
