import { BaseError } from "@usercache/errors"
import { z } from "zod/mini"

// zod/mini loads no locale of its own.
z.config(z.locales.en())

type SchemaIssue = {
  path: readonly unknown[]
  message: string
}

type SchemaError = {
  issues: readonly SchemaIssue[]
}

export type ValidationIssue = { path: string; message: string }

function formatPath(path: readonly unknown[]): string {
  let out = ""

  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }

  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  static fromSchemaError(err: SchemaError): ValidationError {
    const issues = err.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }))

    return new ValidationError(issues[0]?.message ?? "Invalid input", {
      code: "validation_error",
      context: { issues },
    })
  }
}

function isSchemaIssue(value: unknown): value is SchemaIssue {
  return (
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    Array.isArray(value.path) &&
    "message" in value &&
    typeof value.message === "string"
  )
}

function isSchemaError(err: unknown): err is SchemaError {
  return (
    typeof err === "object" &&
    err !== null &&
    "issues" in err &&
    Array.isArray(err.issues) &&
    err.issues.every(isSchemaIssue)
  )
}

/**
 * Parses with a zod (or zod/mini) schema, rethrowing its issues as a
 * ValidationError.
 */
export function parseOrThrow<T>(
  schema: { parse: (data: unknown) => T },
  data: unknown,
): T {
  try {
    return schema.parse(data)
  } catch (err) {
    if (isSchemaError(err)) throw ValidationError.fromSchemaError(err)

    throw err
  }
}
