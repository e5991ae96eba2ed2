import { randomUUID } from 'crypto';

/**
 * Generate a prefixed identifier, e.g. `conn_1f0c...`
 */
export function generateId(prefix?: string): string {
  const id = randomUUID().replace(/-/g, '');
  return prefix ? `${prefix}_${id}` : id;
}
