import {
  type Context,
  parseOrThrow,
  type RequestHandler,
} from "@usercache/server"
import { readJsonBody } from "../../../lib/read-json-body"
import type { UserServices } from "../composition"
import { userBodySchema } from "./user.api.schema"

export function updateUserHandler({
  coordinator,
}: UserServices): RequestHandler {
  return async (c: Context) => {
    const body = parseOrThrow(userBodySchema, await readJsonBody(c))

    await coordinator.updateUser(body)

    return c.body(null, 200)
  }
}
