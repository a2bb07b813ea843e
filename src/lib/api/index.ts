// Core types
export type {
  CatalogItem,
  Page,
  ResourceKind,
  QueryRequestBody,
} from "./core/types";
export { PAGE_SIZE, RESOURCE_KINDS } from "./core/types";

// Custom error class
export { ApiRequestError, describeCause } from "./core/errors";
export type { ApiErrorCode } from "./core/errors";

// Domain modules - Fan collection
export {
  listItems,
  listCollection,
  listWishlist,
  fetchPage,
  initialToken,
  getQueryPath,
} from "./domains/fan-collection";
export type { ListOptions, QueryParams } from "./domains/fan-collection";
