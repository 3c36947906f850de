/** Duration in milliseconds. */
export type Milliseconds = number

/** Duration in seconds. */
export type Seconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = number
