import type { ServerHandle } from "@usercache/server"
import { type AppContextOptions, createAppContext } from "../app/create-context"
import { buildServer } from "./build-server"

/** Loads config, wires the app, runs the start hooks and listens. */
export async function run(
  options: AppContextOptions = {},
): Promise<ServerHandle> {
  const ctx = await createAppContext(options)
  const { logger } = ctx.services.core

  const handle = await buildServer(ctx).server.setupProcessHandlers().start()

  logger.info("User service listening", {
    host: handle.address.host,
    port: handle.address.port,
    env: ctx.config.app.env,
    usersCacheKey: ctx.config.users.cache.key,
  })

  return handle
}
