import type { HashCache } from "./hash-cache"
import type { ListCache } from "./list-cache"
import type { StringCache } from "./string-cache"

export type KeyValueCache = StringCache & ListCache & HashCache
