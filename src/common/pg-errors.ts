export const PG_UNIQUE_VIOLATION = '23505';

export function getPgErrorCode(e: unknown): string | null {
  if (typeof e !== 'object' || e === null || !('code' in e)) return null;
  return typeof e.code === 'string' ? e.code : null;
}
