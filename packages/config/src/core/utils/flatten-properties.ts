import { InvalidPropertyValueError } from "../errors"

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function join(parent: string, child: string): string {
  return parent === "" ? child : `${parent}.${child}`
}

function visit(key: string, value: unknown, out: Record<string, string>): void {
  if (value === undefined) return

  if (value === null) {
    out[key] = ""
    return
  }

  if (Array.isArray(value)) {
    value.forEach((item: unknown, i) => {
      visit(`${key}[${i}]`, item, out)
    })
    return
  }

  if (isPlainObject(value)) {
    for (const [child, item] of Object.entries(value)) {
      visit(join(key, child), item, out)
    }
    return
  }

  switch (typeof value) {
    case "string":
      out[key] = value
      return
    case "number":
    case "boolean":
    case "bigint":
      out[key] = String(value)
      return
    default:
      if (value instanceof Date) {
        out[key] = value.toISOString()
        return
      }
      throw new InvalidPropertyValueError(key, typeof value)
  }
}

/**
 * Flattens nested values to dotted keys with string values.
 *
 * Objects become `parent.child`, arrays `parent[i]`, `null` becomes `""`
 * and `undefined` is dropped.
 *
 * @example
 * ```ts
 * flattenProperties({ db: { hosts: ["a", "b"], port: 5432 } })
 * // { "db.hosts[0]": "a", "db.hosts[1]": "b", "db.port": "5432" }
 * ```
 */
export function flattenProperties(values: Readonly<Record<string, unknown>>): Record<string, string> {
  const out: Record<string, string> = {}

  for (const [key, value] of Object.entries(values)) {
    visit(key, value, out)
  }

  return out
}
