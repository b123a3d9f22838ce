import { createHash, timingSafeEqual } from 'crypto';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export function hashObject(obj: object): string {
  const json = JSON.stringify(obj, Object.keys(obj).sort());
  return sha256(json);
}

export function digestsMatch(expected: string, actual: string): boolean {
  const a = Buffer.from(expected, 'utf-8');
  const b = Buffer.from(actual, 'utf-8');
  return a.length === b.length && timingSafeEqual(a, b);
}
