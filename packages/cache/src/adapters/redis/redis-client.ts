import { createClient } from "redis"

export type RedisSetOptions = { EX: number } | { PX: number } | { PXAT: number }

/**
 * The slice of the node-redis client the cache adapters and lifecycle hooks
 * call. Kept structural so tests can hand in `mock<RedisStringClient>()`.
 */
export type RedisStringClient = {
  isOpen: boolean
  connect(): Promise<unknown>
  quit(): Promise<unknown>
  /** Closes the socket at once and stops any reconnect loop. */
  destroy(): void
  ping(): Promise<string>
  on(event: "error", listener: (err: Error) => void): unknown

  get(key: string): Promise<string | null>
  set(key: string, value: string, opts?: RedisSetOptions): Promise<unknown>

  rPush(key: string, elements: string[]): Promise<number>
  lRange(key: string, start: number, stop: number): Promise<string[]>

  hSet(key: string, field: string, value: string): Promise<number>
  hGet(key: string, field: string): Promise<string | null>
}

export type RedisClientOptions = {
  url: string
}

/** Builds an unconnected client. `connect()` runs as a start hook. */
export function createRedisClient(opts: RedisClientOptions): RedisStringClient {
  return createClient({ url: opts.url }) as unknown as RedisStringClient
}

export async function pingRedis(client: RedisStringClient): Promise<boolean> {
  return (await client.ping()) === "PONG"
}
