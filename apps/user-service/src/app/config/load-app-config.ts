import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  loadConfig,
} from "@usercache/config"
import { applyOverrides, type DeepPartial } from "@usercache/server"
import type { AppConfig } from "."
import { type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      startupTimeoutMs: env.SERVER_STARTUP_TIMEOUT_MS,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      livenessPath: env.SERVER_LIVENESS_PATH,
      readinessPath: env.SERVER_READINESS_PATH,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      enabled: env.REQUEST_ID_ENABLED,
      header: env.REQUEST_ID_HEADER,
      fallbackToTraceparent: env.REQUEST_ID_FALLBACK_TO_TRACEPARENT,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
    mysql: {
      host: env.MYSQL_HOST,
      port: env.MYSQL_PORT,
      user: env.MYSQL_USER,
      password: env.MYSQL_PASSWORD,
      database: env.MYSQL_DATABASE,
      connectionLimit: env.MYSQL_CONNECTION_LIMIT,
    },
    users: {
      cache: {
        key: env.USERS_CACHE_KEY,
        readTtlMs: env.USERS_CACHE_READ_TTL_MS,
        refreshTtlMs: env.USERS_CACHE_REFRESH_TTL_MS,
        fillFailure: env.USERS_CACHE_FILL_FAILURE,
      },
    },
    operationTimeoutMs: env.OPERATION_TIMEOUT_MS,
  }
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: DeepPartial<AppConfig>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  const config = mapEnvToConfig(result.value)

  return overrides ? applyOverrides(config, overrides) : config
}
