export function jsonStringifySafeBigint(obj: unknown, space?: number): string {
  return JSON.stringify(obj, (_, val: unknown) => (typeof val === 'bigint' ? val.toString() : val), space);
}
