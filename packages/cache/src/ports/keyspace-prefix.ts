/**
 * Prefix that scopes an adapter to its own partition of a shared Redis
 * keyspace, e.g. `usercache:prod:`. Treated as opaque and prepended to
 * every key.
 */
export type KeyspacePrefix = string
