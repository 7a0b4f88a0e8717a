/**
 * Formats an unknown error into a single log-friendly line.
 * Follows `cause` chains, so a wrapped driver error (e.g. Drizzle's
 * "Failed query" around a PostgreSQL constraint violation) keeps its root message.
 *
 * @example
 * ```typescript
 * try {
 *   await storage.addSession(session);
 * } catch (error) {
 *   logger.error({ error: formatError(error) }, 'session insert failed');
 * }
 * ```
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause === undefined) {
    return error.message;
  }
  return `${error.message}: ${formatError(error.cause)}`;
}
