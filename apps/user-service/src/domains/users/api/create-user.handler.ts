import {
  type Context,
  parseOrThrow,
  type RequestHandler,
} from "@usercache/server"
import { readJsonBody } from "../../../lib/read-json-body"
import type { UserServices } from "../composition"
import { userBodySchema } from "./user.api.schema"

export function createUserHandler({
  coordinator,
}: UserServices): RequestHandler {
  return async (c: Context) => {
    const body = parseOrThrow(userBodySchema, await readJsonBody(c))

    await coordinator.createUser(body)

    return c.body(null, 201)
  }
}
