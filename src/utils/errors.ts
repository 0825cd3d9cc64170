// src/utils/errors.ts

export type NormalizedError = {
  name: string;
  message: string;
  stack: string;
  code?: string;
};

export function shortStack(err: unknown, lines = 3): string {
  const st = err instanceof Error && err.stack ? err.stack : '';
  if (!st) return '';
  return st.split('\n').slice(0, lines + 1).join('\n');
}

export function normalizeError(err: unknown): NormalizedError {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
      ...(code !== undefined ? { code } : {}),
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}
