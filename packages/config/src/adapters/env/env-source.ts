import { PropertyName } from "../../core/property-name"
import type { PropertySource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with this prefix are read; the prefix is stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Maps an environment variable name to a property key.
 *
 * Lower-cases the name, turns `_` into `.` and purely numeric elements into
 * indexes: `SERVERS_0_HOST` becomes `servers[0].host`. Returns `undefined`
 * for names that do not map to a valid key (`A__B`, `_`).
 */
export function envNameToKey(name: string): string | undefined {
  let key = ""

  for (const element of name.toLowerCase().split("_")) {
    if (element === "") return undefined

    if (/^\d+$/.test(element)) {
      key += `[${element}]`
    } else {
      key += key === "" ? element : `.${element}`
    }
  }

  return PropertyName.tryParse(key) === undefined ? undefined : key
}

export class EnvSource implements PropertySource {
  readonly name = "env"
  private readonly prefix?: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const properties: Record<string, string | undefined> = {}

    for (const [name, value] of Object.entries(this.env)) {
      if (this.prefix && !name.startsWith(this.prefix)) continue

      const key = envNameToKey(this.prefix ? name.slice(this.prefix.length) : name)
      if (key !== undefined) {
        properties[key] = value
      }
    }

    return properties
  }
}
