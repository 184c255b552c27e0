import { timingSafeEqual } from 'node:crypto';

/**
 * Constant-time string comparison for admin key checks.
 *
 * Inputs are padded to a common length so the comparison time does not
 * depend on where (or whether) the lengths differ.
 */
export function safeEqual(a: string, b: string): boolean {
  const bufA = Buffer.from(a);
  const bufB = Buffer.from(b);
  const maxLen = Math.max(bufA.length, bufB.length);
  const paddedA = Buffer.alloc(maxLen);
  const paddedB = Buffer.alloc(maxLen);
  bufA.copy(paddedA);
  bufB.copy(paddedB);
  return timingSafeEqual(paddedA, paddedB) && bufA.length === bufB.length;
}
