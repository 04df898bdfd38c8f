import type { AppConfig } from "../../../app/config"
import type { InfraClients } from "../../../app/services/infra"
import { KeyValuePassthrough } from "../services/key-value-passthrough"

export type KeyValueServices = {
  passthrough: KeyValuePassthrough
}

export function createKeyValueServices(
  config: AppConfig,
  infra: InfraClients,
): KeyValueServices {
  const passthrough = new KeyValuePassthrough(
    { cache: infra.cache },
    { operationTimeoutMs: config.operationTimeoutMs },
  )

  return { passthrough }
}
