export { createUsersModule } from "./api"
export { createUserServices, type UserServices } from "./composition"
export { bootstrapUserSchema } from "./infra/user-schema.mysql"
export { MemoryUserStore } from "./infra/user-store.memory"
export { MySqlUserStore } from "./infra/user-store.mysql"
export type { UserStore } from "./model/user-store"
