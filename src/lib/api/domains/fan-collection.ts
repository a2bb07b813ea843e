import { paginate, type PageProgress } from "../../utils/paginate";
import { toUnixSeconds } from "../../utils/time-parser";
import { ApiRequestError } from "../core/errors";
import { httpPost } from "../core/http";
import {
  PAGE_SIZE,
  apiErrorResponseSchema,
  pageResponseSchema,
  type CatalogItem,
  type Page,
  type QueryRequestBody,
  type ResourceKind,
} from "../core/types";

const QUERY_PATHS: Record<ResourceKind, string> = {
  collection: "/api/fancollection/1/collection_items",
  wishlist: "/api/fancollection/1/wishlist_items",
};

/**
 * Parameters for fetching a single page
 */
export interface QueryParams {
  kind: ResourceKind;
  fanId: number;
  token: string;
  identity?: string;
  signal?: AbortSignal;
}

export interface ListOptions {
  /**
   * Identity cookie of the logged-in fan. Needed to see private or hidden
   * items; passed through as-is.
   */
  identity?: string;
  /**
   * Aborts the in-flight request, or stops before the next one
   */
  signal?: AbortSignal;
  /**
   * Clock used for the first page's token (epoch milliseconds)
   */
  now?: () => number;
  onPage?: (progress: PageProgress) => void;
}

export function getQueryPath(kind: ResourceKind): string {
  return QUERY_PATHS[kind];
}

/**
 * Token for the first page. The API rejects an empty token, so this
 * seeds it the same way the website does.
 */
export function initialToken(nowMs: number): string {
  return `${toUnixSeconds(nowMs)}:0:a::`;
}

/**
 * Fetch one page of collection or wishlist items
 */
export async function fetchPage(params: QueryParams): Promise<Page> {
  const { kind, fanId, token, identity, signal } = params;

  if (signal?.aborted) {
    throw new ApiRequestError(`Listing ${kind} was aborted`, "TRANSPORT_ERROR", 0, {
      cause: signal.reason,
    });
  }

  const body: QueryRequestBody = {
    fan_id: fanId,
    older_than_token: token,
    count: PAGE_SIZE,
  };
  const response = await httpPost(getQueryPath(kind), body, {
    identity,
    signal,
  });

  if (!response.ok) {
    // Release the connection; the error body is not used
    await response.body?.cancel();
    throw new ApiRequestError(
      `Failed to list ${kind} items`,
      "HTTP_ERROR",
      response.status,
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    if (signal?.aborted) {
      throw new ApiRequestError(
        `Listing ${kind} was aborted`,
        "TRANSPORT_ERROR",
        0,
        { cause: error },
      );
    }
    throw new ApiRequestError(
      `Invalid ${kind} response: body is not JSON`,
      "DECODE_ERROR",
      response.status,
      { cause: error },
    );
  }

  const apiError = apiErrorResponseSchema.safeParse(payload);
  if (apiError.success) {
    throw new ApiRequestError(
      `Failed to list ${kind} items: ${apiError.data.error_message}`,
      "DECODE_ERROR",
      response.status,
    );
  }

  const result = pageResponseSchema.safeParse(payload);
  if (!result.success) {
    throw new ApiRequestError(
      `Invalid ${kind} response`,
      "DECODE_ERROR",
      response.status,
      { cause: result.error },
    );
  }

  return result.data;
}

/**
 * List every item in a fan's collection or wishlist, in the order the
 * server returns them.
 *
 * Assumes a valid fan ID (and identity, when one is required); neither is
 * checked here.
 *
 * @throws ApiRequestError on the first failed page; nothing is retried
 */
export async function listItems(
  kind: ResourceKind,
  fanId: number,
  options: ListOptions = {},
): Promise<CatalogItem[]> {
  const { identity, signal, now = Date.now, onPage } = options;

  return paginate<CatalogItem, string>({
    initialCursor: initialToken(now()),
    onPage,
    fetchPage: async (token) => {
      const page = await fetchPage({ kind, fanId, token, identity, signal });
      return {
        items: page.items,
        nextCursor: page.lastToken,
        hasMore: page.moreAvailable,
      };
    },
  });
}

export async function listCollection(
  fanId: number,
  options?: ListOptions,
): Promise<CatalogItem[]> {
  return listItems("collection", fanId, options);
}

export async function listWishlist(
  fanId: number,
  options?: ListOptions,
): Promise<CatalogItem[]> {
  return listItems("wishlist", fanId, options);
}
