import { createConnection, createPool } from "mysql2/promise"

/**
 * The slice of a mysql2 pool or connection the stores and lifecycle hooks
 * call. Structural, so tests can hand in `mock<MySqlClient>()`.
 */
export type MySqlClient = {
  query(sql: string): Promise<[unknown, unknown]>
  execute(sql: string, values: (string | number)[]): Promise<[unknown, unknown]>
  end(): Promise<void>
}

export type MySqlServerOptions = {
  host: string
  port: number
  user: string
  password: string
}

export type MySqlPoolOptions = MySqlServerOptions & {
  database: string
  connectionLimit: number
}

/** Connections are opened lazily, so building the pool touches no network. */
export function createMySqlPool(opts: MySqlPoolOptions): MySqlClient {
  return createPool({
    host: opts.host,
    port: opts.port,
    user: opts.user,
    password: opts.password,
    database: opts.database,
    connectionLimit: opts.connectionLimit,
  })
}

/**
 * A single connection with no default database, for server-level
 * statements.
 */
export async function connectMySqlServer(
  opts: MySqlServerOptions,
): Promise<MySqlClient> {
  return createConnection({
    host: opts.host,
    port: opts.port,
    user: opts.user,
    password: opts.password,
  })
}

export async function pingMySql(client: MySqlClient): Promise<boolean> {
  await client.query("SELECT 1")

  return true
}
