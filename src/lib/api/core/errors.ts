import { ZodError } from "zod";

export type ApiErrorCode = "TRANSPORT_ERROR" | "HTTP_ERROR" | "DECODE_ERROR";

/**
 * Custom API request error with code and HTTP status.
 * Status is 0 when no response was received.
 */
export class ApiRequestError extends Error {
  constructor(
    message: string,
    public code: ApiErrorCode,
    public status: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ApiRequestError";
  }
}

/**
 * One-line description of an error's cause, if it has one
 */
export function describeCause(error: Error): string | undefined {
  const cause = error.cause;
  if (cause instanceof ZodError) {
    return cause.issues
      .map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join("; ");
  }
  if (cause instanceof Error) {
    return cause.message;
  }
  return undefined;
}
