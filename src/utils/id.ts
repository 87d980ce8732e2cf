import { createHash, randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

/** Stable short id derived from a set of member ids, independent of their order. */
export function stableId(prefix: string, parts: readonly string[]): string {
  const digest = createHash('sha1').update([...parts].sort().join('\n')).digest('hex');
  return `${prefix}-${digest.slice(0, 12)}`;
}
