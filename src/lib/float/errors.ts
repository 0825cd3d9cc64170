export type DecomposedFloatErrorCode = 'INVALID_COMPONENTS' | 'INVALID_JSON';

export class DecomposedFloatError extends Error {
  constructor(
    message: string,
    public readonly code: DecomposedFloatErrorCode,
    public readonly input?: unknown
  ) {
    super(message);
    this.name = 'DecomposedFloatError';
  }
}
