import type { Application } from "@usercache/server"
import { createKeyValueModule } from "../../domains/kv"
import { createUsersModule } from "../../domains/users"
import type { DomainServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(
  app: Application,
  services: DomainServices,
): void {
  const modules: ApiModule[] = [
    createUsersModule({ users: services.users }),
    createKeyValueModule({ kv: services.kv }),
  ]

  for (const m of modules) m.register(app)
}

export type RegisterRoutesFn = typeof registerRoutes
