import type { Context, RequestHandler } from "@usercache/server"
import type { UserServices } from "../composition"
import { UserError } from "../model/user.errors"

export function deleteUserHandler({
  coordinator,
}: UserServices): RequestHandler {
  return async (c: Context) => {
    const username = c.req.query("username")

    if (!username) throw UserError.missingField("username", "query")

    await coordinator.deleteUser(username)

    return c.body(null, 200)
  }
}
