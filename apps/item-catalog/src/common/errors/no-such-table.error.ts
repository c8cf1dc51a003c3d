/**
 * Raised when a repository touches a table that was never created,
 * which means the migrations have not been applied yet.
 */
export class NoSuchTableError extends Error {
  constructor(
    readonly table: string,
    options?: ErrorOptions,
  ) {
    super(`no such table: ${table}`, options);
    this.name = 'NoSuchTableError';
  }
}

export function isMissingTableError(error: unknown): boolean {
  return error instanceof Error && error.name === 'ResourceNotFoundException';
}
