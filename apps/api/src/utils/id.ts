import { randomUUID } from 'node:crypto';

/**
 * Generate a unique ID
 */
export function generateId(): string {
  return randomUUID();
}
