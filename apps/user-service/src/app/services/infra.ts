import {
  createRedisClient,
  type KeyValueCache,
  RedisKeyValueCache,
  type RedisStringClient,
} from "@usercache/cache"
import { MySqlUserStore, type UserStore } from "../../domains/users"
import {
  connectMySqlServer,
  createMySqlPool,
  type MySqlClient,
} from "../../lib/mysql-client"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraClients = {
  redisClient: RedisStringClient
  mysqlPool: MySqlClient
  /** Opens a connection with no default database; the caller ends it. */
  connectMySqlServer: () => Promise<MySqlClient>

  cache: KeyValueCache
  userStore: UserStore
}

/** Builds every client unconnected. Start hooks open them. */
export function createDefaultInfraClients(
  config: AppConfig,
  core: CoreServices,
): InfraClients {
  const redisClient = createRedisClient({ url: config.redis.url })

  redisClient.on("error", (err) => {
    core.logger.error("Redis client error", { err })
  })

  const mysqlPool = createMySqlPool(config.mysql)

  return {
    redisClient,
    mysqlPool,
    connectMySqlServer: () => connectMySqlServer(config.mysql),
    cache: new RedisKeyValueCache(redisClient, {
      keyspacePrefix: config.redis.keyPrefix,
    }),
    userStore: new MySqlUserStore({ pool: mysqlPool }),
  }
}
