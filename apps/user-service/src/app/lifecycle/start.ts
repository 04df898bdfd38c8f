import type { LifecycleHook } from "@usercache/server"
import { bootstrapUserSchema } from "../../domains/users"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { infra, config } = context

  return [
    {
      name: "start:redis",
      fn: async ({ signal }) => {
        if (infra.redisClient.isOpen) return

        // connect() retries forever against an unreachable server
        const giveUp = (): void => {
          if (infra.redisClient.isOpen) infra.redisClient.destroy()
        }

        signal.addEventListener("abort", giveUp, { once: true })

        try {
          await infra.redisClient.connect()
        } finally {
          signal.removeEventListener("abort", giveUp)
        }
      },
    },
    {
      name: "start:mysql:schema",
      fn: async () => {
        const connection = await infra.connectMySqlServer()

        try {
          await bootstrapUserSchema({
            connection,
            pool: infra.mysqlPool,
            database: config.mysql.database,
          })
        } finally {
          await connection.end()
        }
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
