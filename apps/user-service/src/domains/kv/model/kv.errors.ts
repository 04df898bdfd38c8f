import { BaseError } from "@usercache/errors"

export type KeyValueErrorCode =
  | "missing_parameters"
  | "cache_key_not_found"
  | "cache_field_not_found"

export class KeyValueError extends BaseError<KeyValueErrorCode> {
  static missingParameters(message: string, required: string[]): KeyValueError {
    return new KeyValueError(message, {
      code: "missing_parameters",
      context: { required },
    })
  }

  static keyNotFound(key: string): KeyValueError {
    return new KeyValueError(`Key not found: ${key}`, {
      code: "cache_key_not_found",
      context: { key },
    })
  }

  static fieldNotFound(key: string, field: string): KeyValueError {
    return new KeyValueError(`Field ${field} not found in key ${key}`, {
      code: "cache_field_not_found",
      context: { key, field },
    })
  }
}
