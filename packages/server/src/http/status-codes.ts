import type { ContentfulStatusCode } from "hono/utils/http-status"

/** Statuses that may carry a body, so error responses can be JSON. */
export type StatusCode = ContentfulStatusCode
