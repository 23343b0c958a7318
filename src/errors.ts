/**
 * Persistence failure for one transactional unit (an on-demand run, or one
 * user's slice of a pool run). Everything in that unit has been rolled back.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly unit: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
