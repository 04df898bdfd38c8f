/** A duration in milliseconds. */
export type Milliseconds = number

/** A duration in seconds. */
export type Seconds = number

/** An instant, as milliseconds since the Unix epoch. */
export type UnixMs = number
