export { withErrorHandler } from "./with-error-handler";
export { parsePositiveInteger } from "./arg-parsers";
