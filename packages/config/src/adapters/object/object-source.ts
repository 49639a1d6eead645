import { flattenProperties } from "../../core/utils/flatten-properties"
import type { PropertySource } from "../../ports/source"

/** In-memory properties, flattened like JSON. */
export class ObjectSource implements PropertySource {
  constructor(
    private readonly obj: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return flattenProperties(this.obj)
  }
}
