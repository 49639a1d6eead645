import type { ConfigEntry, ConfigSource } from "../ports/config-source"
import { PropertyName } from "./property-name"

export type PropertyInput = Readonly<{
  key: string
  value: string
  origin?: string
}>

export class ConfigSnapshot implements ConfigSource {
  private readonly byName = new Map<string, ConfigEntry>()

  /**
   * Entries are indexed by canonical name; a later entry replaces an earlier
   * one with the same canonical name and moves to the end.
   *
   * Throws `InvalidPropertyNameError` for keys that do not parse.
   */
  constructor(inputs: Iterable<PropertyInput>) {
    for (const input of inputs) {
      const name = PropertyName.parse(input.key)
      const entry: ConfigEntry = Object.freeze({
        key: input.key,
        name,
        value: input.value,
        origin: input.origin ?? "inline",
      })

      this.byName.delete(name.canonical)
      this.byName.set(name.canonical, entry)
    }
  }

  get size(): number {
    return this.byName.size
  }

  get(key: string): string | undefined {
    return this.lookup(key)?.value
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined
  }

  origin(key: string): string | undefined {
    return this.lookup(key)?.origin
  }

  sourcesUsed(): string[] {
    return [...new Set(this.entries().map((entry) => entry.origin))]
  }

  keys(): string[] {
    return this.entries().map((entry) => entry.key)
  }

  entries(): ConfigEntry[] {
    return [...this.byName.values()]
  }

  find(name: PropertyName): ConfigEntry | undefined {
    return this.byName.get(name.canonical)
  }

  descendants(name: PropertyName): ConfigEntry[] {
    return this.entries().filter((entry) => name.isAncestorOf(entry.name))
  }

  private lookup(key: string): ConfigEntry | undefined {
    const name = PropertyName.tryParse(key)

    return name === undefined ? undefined : this.find(name)
  }
}

/**
 * Builds a `ConfigSource` from literal values, mostly for tests and
 * programmatic overrides.
 *
 * @example
 * ```ts
 * const source = createConfigSource({ "app.pool.max-size": "20" })
 * ```
 */
export function createConfigSource(
  values: Readonly<Record<string, string>>,
  origin: string = "inline",
): ConfigSource {
  return new ConfigSnapshot(Object.entries(values).map(([key, value]) => ({ key, value, origin })))
}
