import { z } from "zod/mini"

export const userRecordSchema = z.object({
  id: z.int(),
  username: z.string(),
  email: z.string(),
})

export type UserRecord = z.infer<typeof userRecordSchema>

/** Fields a client supplies. `id` is always assigned by the store. */
export type NewUser = Omit<UserRecord, "id">

/** A write request before presence validation. */
export type UserDraft = {
  username?: string | undefined
  email?: string | undefined
}

export type UserField = keyof NewUser
