import { EnvSource } from "../adapters/env/env-source"
import type { ConfigSource } from "../ports/config-source"
import type { PropertySource } from "../ports/source"
import { ConfigSnapshot, type PropertyInput } from "./config-snapshot"
import { flattenProperties } from "./utils/flatten-properties"

export type LoadConfigSourceOptions = {
  /** Defaults to `[new EnvSource()]`. */
  sources?: PropertySource[]
}

/**
 * Loads every source in order and materializes one read-only `ConfigSource`.
 *
 * Later sources override earlier ones; `undefined` values are dropped and
 * scalars are converted to strings (`null` becomes `""`).
 */
export async function loadConfigSource({
  sources,
}: LoadConfigSourceOptions = {}): Promise<ConfigSource> {
  const inputs: PropertyInput[] = []
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(flattenProperties(values))) {
      inputs.push({ key, value, origin: source.name })
    }
  }

  return new ConfigSnapshot(inputs)
}
