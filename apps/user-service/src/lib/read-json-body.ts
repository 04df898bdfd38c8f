import { BaseError } from "@usercache/errors"
import type { Context } from "@usercache/server"

export class InvalidJsonBodyError extends BaseError<"invalid_json_body"> {
  constructor(cause: unknown) {
    super("Request body is not valid JSON", {
      code: "invalid_json_body",
      cause,
    })
  }
}

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json()

    return body
  } catch (err) {
    throw new InvalidJsonBodyError(err)
  }
}
