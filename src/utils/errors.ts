// Error types for failures that stop a batch before any job starts.

export class SessionError extends Error {
  readonly directory: string;

  constructor(directory: string, cause: unknown) {
    super(`Could not create session directory ${directory}: ${formatError(cause)}`);
    this.name = "SessionError";
    this.directory = directory;
    this.cause = cause;
  }
}

export const formatError = (error: unknown) => {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "Unknown error";
};
