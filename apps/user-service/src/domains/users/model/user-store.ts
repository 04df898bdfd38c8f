import type { NewUser, UserRecord } from "./user.model"

export type MutationResult = {
  affectedRows: number
}

/** Durable home of user records. Knows nothing about caching. */
export interface UserStore {
  /** Every row, in whatever order the store yields them. */
  findAll(): Promise<UserRecord[]>

  insert(user: NewUser): Promise<MutationResult>

  /** Sets the email of every row carrying `username`. */
  updateEmail(user: NewUser): Promise<MutationResult>

  /** Zero affected rows is a success. */
  deleteByUsername(username: string): Promise<MutationResult>
}
