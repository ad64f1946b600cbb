export const PG_UNIQUE_VIOLATION = '23505';

export function getPgErrorCode(e: unknown): string | null {
  if (typeof e !== 'object' || e === null) return null;
  const code: unknown = Reflect.get(e, 'code');
  return typeof code === 'string' ? code : null;
}

export function isUniqueViolation(e: unknown): boolean {
  return getPgErrorCode(e) === PG_UNIQUE_VIOLATION;
}
