export const DETERMINISTIC_CREATED_AT_ISO = '1970-01-01T00:00:00.000Z' as const;

export function createdAtIso(deterministic: boolean, now: () => Date = () => new Date()): string {
  return deterministic ? DETERMINISTIC_CREATED_AT_ISO : now().toISOString();
}
