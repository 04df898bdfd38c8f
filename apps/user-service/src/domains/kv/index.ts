export { createKeyValueModule } from "./api"
export { createKeyValueServices, type KeyValueServices } from "./composition"
