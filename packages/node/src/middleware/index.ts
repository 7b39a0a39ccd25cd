/**
 * Middleware barrel.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, resolveRequestId, REQUEST_ID_HEADER } from "./request-id.js";
export { requestLogger, levelForStatus } from "./logger.js";
export type { RequestLogLevel } from "./logger.js";
export { validateBody, validateQuery, formatZodErrors } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
