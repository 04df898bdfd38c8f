export {
  type CreateErrorHandlerFn,
  createErrorHandler,
  type ErrorHandler,
} from "./create-error-handler"
export {
  createErrorFormatter,
  type ErrorFormatter,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type FallbackMapping,
} from "./error-formatter"
export {
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./validation"
