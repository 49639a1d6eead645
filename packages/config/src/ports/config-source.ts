import type { PropertyName } from "../core/property-name"

export type ConfigEntry = Readonly<{
  /** Key as written by its source */
  key: string
  name: PropertyName
  value: string
  /** Name of the property source that supplied the value */
  origin: string
}>

/**
 * An ordered, read-only snapshot of configuration properties.
 *
 * Lookups are relaxed: `get("app.max-size")`, `get("app.maxSize")` and
 * `get("APP.MAX_SIZE")` all find the same entry.
 */
export interface ConfigSource {
  readonly size: number

  get(key: string): string | undefined
  has(key: string): boolean

  /** Which property source supplied `key`. */
  origin(key: string): string | undefined

  /** Names of the property sources that supplied at least one entry, in order of first use. */
  sourcesUsed(): string[]

  /** Keys in insertion order, as written by their sources. */
  keys(): string[]
  entries(): ConfigEntry[]

  find(name: PropertyName): ConfigEntry | undefined

  /** Entries strictly below `name`, in insertion order. */
  descendants(name: PropertyName): ConfigEntry[]
}
