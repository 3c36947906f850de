/** Runs async sections one at a time, in call order. */
export class Mutex {
  private tail: Promise<unknown> = Promise.resolve()

  runExclusive<T>(section: () => Promise<T>): Promise<T> {
    const run = this.tail.then(section)

    // The chain only orders sections; each failure reaches its own caller via `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    )

    return run
  }
}
