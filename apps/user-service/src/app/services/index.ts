import { createKeyValueServices, type KeyValueServices } from "../../domains/kv"
import { createUserServices, type UserServices } from "../../domains/users"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  users: UserServices
  kv: KeyValueServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export function createDefaultDomainServices(
  config: AppConfig,
  infra: InfraClients,
  core: CoreServices,
): DomainServices {
  return {
    users: createUserServices(config, core, infra),
    kv: createKeyValueServices(config, infra),
  }
}
