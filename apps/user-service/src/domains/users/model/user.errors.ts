import { BaseError } from "@usercache/errors"
import type { UserField } from "./user.model"

export type UserErrorCode =
  | "missing_required_field"
  | "users_serialization_failed"

export class UserError extends BaseError<UserErrorCode> {
  /**
   * `source` picks the wording: body fields and query parameters read
   * differently to the client.
   */
  static missingField(
    field: UserField,
    source: "body" | "query" = "body",
  ): UserError {
    const message =
      source === "query"
        ? `Missing ${field} parameter`
        : `Missing required field: ${field}`

    return new UserError(message, {
      code: "missing_required_field",
      context: { field, source },
    })
  }

  static serializationFailed(cause: unknown): UserError {
    return new UserError("Failed to serialize users", {
      code: "users_serialization_failed",
      cause,
      isOperational: false,
    })
  }
}
