import { setImmediate } from "node:timers/promises"

/** Lets pending promise chains and one round of I/O callbacks run. */
export async function tick(rounds = 1): Promise<void> {
  for (let i = 0; i < rounds; i++) await setImmediate()
}
