import type { Application } from "@usercache/server"
import type { UserServices } from "../composition"
import { createUserHandler } from "./create-user.handler"
import { deleteUserHandler } from "./delete-user.handler"
import { listUsersHandler } from "./list-users.handler"
import { updateUserHandler } from "./update-user.handler"

type UsersModuleDeps = {
  users: UserServices
}

export function createUsersModule(deps: UsersModuleDeps) {
  return {
    name: "users",
    register: (api: Application) => {
      api.get("/users", listUsersHandler(deps.users))
      api.post("/user", createUserHandler(deps.users))
      api.post("/user/update", updateUserHandler(deps.users))
      api.post("/user/delete", deleteUserHandler(deps.users))
    },
  }
}
