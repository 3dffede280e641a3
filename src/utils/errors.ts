/**
 * Raised for bad arguments at the boundary (unknown master, unknown glyph,
 * empty subset, unreadable source). Findings never travel as errors.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
