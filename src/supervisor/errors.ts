export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A tick body failed. Recovered by the supervisor, never rethrown.
 */
export class TickError extends Error {
  readonly tick: number;

  constructor(tick: number, cause: unknown) {
    super(`Error in agent loop: ${describeError(cause)}`, { cause });
    this.name = 'TickError';
    this.tick = tick;
  }
}
