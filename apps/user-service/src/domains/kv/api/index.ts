import type { Application } from "@usercache/server"
import type { KeyValueServices } from "../composition"
import {
  getHashHandler,
  getListHandler,
  getStringHandler,
  setHashHandler,
  setListHandler,
  setStringHandler,
} from "./kv.handlers"

type KeyValueModuleDeps = {
  kv: KeyValueServices
}

const GET_OR_POST = ["GET", "POST"]

export function createKeyValueModule(deps: KeyValueModuleDeps) {
  return {
    name: "kv",
    register: (api: Application) => {
      api.on(GET_OR_POST, "/set-string", setStringHandler(deps.kv))
      api.on(GET_OR_POST, "/get-string", getStringHandler(deps.kv))
      api.on(GET_OR_POST, "/set-list", setListHandler(deps.kv))
      api.on(GET_OR_POST, "/get-list", getListHandler(deps.kv))
      api.on(GET_OR_POST, "/set-hash", setHashHandler(deps.kv))
      api.on(GET_OR_POST, "/get-hash", getHashHandler(deps.kv))
    },
  }
}
