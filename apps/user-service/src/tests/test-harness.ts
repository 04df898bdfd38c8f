import { MemoryKeyValueCache } from "@usercache/cache"
import { FakeClock } from "@usercache/clock"
import { NullLogger } from "@usercache/logger"
import type { Application } from "@usercache/server"
import type { AppContext, AppContextOptions } from "../app/create-context"
import { createAppContext } from "../app/create-context"
import { MemoryUserStore } from "../domains/users"
import { buildServer } from "../server"

export type TestHarness = {
  /** Fully built Hono app, ready for app.request() */
  app: Application

  /** App context with config and services */
  ctx: AppContext

  /** Drives cache expiry */
  clock: FakeClock

  userStore: MemoryUserStore
  cache: MemoryKeyValueCache
}

export const TEST_START_MS = Date.parse("2024-01-15T10:30:00Z")

/**
 * Builds the real app over in-process adapters. No start hooks run, so
 * nothing connects to Redis or MySQL.
 */
export async function createTestHarness(
  options: AppContextOptions = {},
): Promise<TestHarness> {
  const clock = new FakeClock(TEST_START_MS)
  const userStore = new MemoryUserStore()
  const cache = new MemoryKeyValueCache({ clock }, { maxEntries: 1_000 })

  const ctx = await createAppContext({
    env: { NODE_ENV: "test" },
    ...options,
    coreOverrides: {
      logger: new NullLogger(),
      clock,
      ...options.coreOverrides,
    },
    infraOverrides: { userStore, cache, ...options.infraOverrides },
  })

  const { server } = buildServer(ctx)

  server.build()

  return { app: server.app, ctx, clock, userStore, cache }
}
