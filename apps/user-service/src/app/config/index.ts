export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { AppConfig, EnvConfig } from "./schema"
