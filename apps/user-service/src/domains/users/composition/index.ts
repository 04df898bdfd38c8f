import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { UserCacheCoordinator } from "../services/user-cache-coordinator"

export type UserServices = {
  coordinator: UserCacheCoordinator
}

export function createUserServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): UserServices {
  const coordinator = new UserCacheCoordinator(
    {
      store: infra.userStore,
      cache: infra.cache,
      logger: core.logger.child({ module: "users" }),
    },
    {
      cacheKey: config.users.cache.key,
      readTtl: {
        kind: "milliseconds",
        milliseconds: config.users.cache.readTtlMs,
      },
      refreshTtl: {
        kind: "milliseconds",
        milliseconds: config.users.cache.refreshTtlMs,
      },
      operationTimeoutMs: config.operationTimeoutMs,
      cacheFillFailure: config.users.cache.fillFailure,
    },
  )

  return { coordinator }
}
