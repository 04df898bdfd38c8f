import { z } from "zod/mini"
import type { MySqlClient } from "../../../lib/mysql-client"
import type { MutationResult, UserStore } from "../model/user-store"
import {
  type NewUser,
  type UserRecord,
  userRecordSchema,
} from "../model/user.model"

const SELECT_ALL = "SELECT id, username, email FROM users"
const INSERT = "INSERT INTO users (username, email) VALUES (?, ?)"
const UPDATE_EMAIL = "UPDATE users SET email = ? WHERE username = ?"
const DELETE_BY_USERNAME = "DELETE FROM users WHERE username = ?"

const rowsSchema = z.array(userRecordSchema)
const resultHeaderSchema = z.object({ affectedRows: z.number() })

type MySqlUserStoreDeps = {
  pool: MySqlClient
}

export class MySqlUserStore implements UserStore {
  constructor(private readonly deps: MySqlUserStoreDeps) {}

  async findAll(): Promise<UserRecord[]> {
    const [rows] = await this.deps.pool.query(SELECT_ALL)

    return rowsSchema.parse(rows)
  }

  async insert(user: NewUser): Promise<MutationResult> {
    return this.mutate(INSERT, [user.username, user.email])
  }

  async updateEmail(user: NewUser): Promise<MutationResult> {
    return this.mutate(UPDATE_EMAIL, [user.email, user.username])
  }

  async deleteByUsername(username: string): Promise<MutationResult> {
    return this.mutate(DELETE_BY_USERNAME, [username])
  }

  private async mutate(sql: string, values: string[]): Promise<MutationResult> {
    const [header] = await this.deps.pool.execute(sql, values)

    return { affectedRows: resultHeaderSchema.parse(header).affectedRows }
  }
}
