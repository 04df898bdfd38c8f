import type { LifecycleHook } from "@usercache/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  const { infra } = context

  return [
    {
      name: "stop:redis",
      fn: async () => {
        if (infra.redisClient.isOpen) await infra.redisClient.quit()
      },
    },
    {
      name: "stop:mysql",
      fn: async () => {
        await infra.mysqlPool.end()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
