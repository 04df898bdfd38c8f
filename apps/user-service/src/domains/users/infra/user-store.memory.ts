import type { MutationResult, UserStore } from "../model/user-store"
import type { NewUser, UserRecord } from "../model/user.model"

/** In-process {@link UserStore} with sequential ids starting at 1. */
export class MemoryUserStore implements UserStore {
  private rows: UserRecord[] = []
  private nextId = 1

  async findAll(): Promise<UserRecord[]> {
    return this.rows.map((row) => ({ ...row }))
  }

  async insert(user: NewUser): Promise<MutationResult> {
    this.rows.push({
      id: this.nextId++,
      username: user.username,
      email: user.email,
    })

    return { affectedRows: 1 }
  }

  async updateEmail(user: NewUser): Promise<MutationResult> {
    let affectedRows = 0

    for (const row of this.rows) {
      if (row.username !== user.username) continue

      row.email = user.email
      affectedRows++
    }

    return { affectedRows }
  }

  async deleteByUsername(username: string): Promise<MutationResult> {
    const before = this.rows.length

    this.rows = this.rows.filter((row) => row.username !== username)

    return { affectedRows: before - this.rows.length }
  }
}
