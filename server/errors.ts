/** An error that maps directly onto an HTTP status and `{ error }` body. */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Resource not found") {
    super(404, message);
  }
}

export const INVALID_QUERY_MESSAGE = "Search query must be at least 2 characters";
export const MISSING_FIELDS_MESSAGE = "Missing required fields";
export const INVALID_YEAR_MESSAGE = "Year must be an integer";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
