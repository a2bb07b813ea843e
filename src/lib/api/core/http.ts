import { getApiUrl } from "../../config";
import { ApiRequestError } from "./errors";

export interface HttpOptions {
  /** Session cookie value, sent untouched as the `identity` cookie */
  identity?: string;
  signal?: AbortSignal;
}

/**
 * Get headers for raw HTTP requests
 */
function getRawHeaders(identity?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json",
  };

  if (identity) {
    headers.Cookie = `identity=${identity}`;
  }

  return headers;
}

/**
 * Generic POST request with a JSON body.
 *
 * Rejects with a TRANSPORT_ERROR when no response is received; the
 * response is returned as-is whatever its status.
 */
export async function httpPost(
  path: string,
  body: unknown,
  options: HttpOptions = {},
): Promise<Response> {
  const baseUrl = await getApiUrl();
  const url = `${baseUrl}${path}`;

  try {
    return await fetch(url, {
      method: "POST",
      headers: {
        ...getRawHeaders(options.identity),
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal: options.signal,
    });
  } catch (error) {
    throw new ApiRequestError(`Request to ${url} failed`, "TRANSPORT_ERROR", 0, {
      cause: error,
    });
  }
}
