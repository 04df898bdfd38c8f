import { escapeId } from "mysql2"
import type { MySqlClient } from "../../../lib/mysql-client"

const CREATE_USERS_TABLE = `CREATE TABLE IF NOT EXISTS users (
  id INT AUTO_INCREMENT PRIMARY KEY,
  username VARCHAR(50) NOT NULL,
  email VARCHAR(50) NOT NULL
)`

export type BootstrapUserSchemaInput = {
  /** Server-level connection; the database may not exist yet. */
  connection: MySqlClient
  /** Pool bound to `database`. */
  pool: MySqlClient
  database: string
}

/** Creates the database and the users table when absent. Never alters them. */
export async function bootstrapUserSchema(
  input: BootstrapUserSchemaInput,
): Promise<void> {
  await input.connection.query(
    `CREATE DATABASE IF NOT EXISTS ${escapeId(input.database)}`,
  )
  await input.pool.query(CREATE_USERS_TABLE)
}
