import type { Context, RequestHandler } from "@usercache/server"
import type { UserServices } from "../composition"

export function listUsersHandler({
  coordinator,
}: UserServices): RequestHandler {
  return async (c: Context) => {
    const snapshot = await coordinator.listUsers()

    return c.body(snapshot.payload, 200, {
      "Content-Type": "application/json",
      "X-Cache": snapshot.source === "cache" ? "hit" : "miss",
    })
  }
}
