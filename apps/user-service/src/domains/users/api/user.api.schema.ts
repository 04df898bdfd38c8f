import { z } from "zod/mini"

/** Presence is checked by the coordinator; only types are checked here. */
export const userBodySchema = z.object({
  username: z.optional(z.string()),
  email: z.optional(z.string()),
})

export type UserBody = z.infer<typeof userBodySchema>
