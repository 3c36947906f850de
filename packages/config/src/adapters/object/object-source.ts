import type { ConfigSource } from "../../ports/source"

/**
 * Programmatic values, typically overrides passed by the embedding
 * application on top of the environment.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
