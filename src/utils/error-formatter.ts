/**
 * Formats any error into a consistent string representation
 * @param error Any error that needs to be formatted
 * @returns Formatted error message
 */
export const formatError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

/**
 * Wraps a non-Error throwable so it can travel inside a `Result`
 */
export const toError = (error: unknown): Error => {
  return error instanceof Error ? error : new Error(String(error));
};
