import type { z } from "zod"
import type { ConfigEntry, ConfigSource } from "../ports/config-source"
import type { Bound, BindingSchema, BindingSpec } from "./binding-spec"
import { BindError, InvalidFieldError, UnknownFieldError } from "./errors"
import { classifyField, type FieldSchema, fieldFallback, fieldTypeName, parseField } from "./fields"
import { type NameElement, PropertyName, renderElements } from "./property-name"

export type BindResult<T> = { success: true; value: T } | { success: false; error: BindError }

const NUMERIC = /^\d+$/

/** State of one bind call: the keys fields have claimed so far. */
class Binding {
  private readonly claimed = new Set<string>()

  constructor(
    readonly source: ConfigSource,
    readonly spec: BindingSpec,
  ) {}

  claim(entry: ConfigEntry): void {
    this.claimed.add(entry.name.canonical)
  }

  isClaimed(entry: ConfigEntry): boolean {
    return this.claimed.has(entry.name.canonical)
  }

  /** Throws unless the spec ignores invalid fields; the caller then keeps the default. */
  reject(field: string, entry: ConfigEntry, targetType: string, reason: string): void {
    if (this.spec.ignoreInvalidFields) return

    throw new InvalidFieldError({
      field,
      key: entry.key,
      value: entry.value,
      targetType,
      reason,
      origin: entry.origin,
    })
  }

  convert(schema: FieldSchema, entry: ConfigEntry, field: string): { value: unknown } | undefined {
    const result = parseField(schema, entry.value)
    if (result.ok) return { value: result.value }

    this.reject(field, entry, fieldTypeName(schema), result.reason)
    return undefined
  }
}

function fieldPath(parent: string, field: string): string {
  return parent === "" ? field : `${parent}.${field}`
}

function bindShape(
  b: Binding,
  shape: z.core.$ZodShape,
  name: PropertyName,
  path: string,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(shape).map(([field, schema]) => [
      field,
      bindField(b, schema, name.append(field), fieldPath(path, field)),
    ]),
  )
}

function bindField(b: Binding, schema: FieldSchema, name: PropertyName, path: string): unknown {
  const kind = classifyField(schema)

  switch (kind.kind) {
    case "scalar": {
      const entry = b.source.find(name)
      if (!entry) return fieldFallback(schema)

      b.claim(entry)
      const converted = b.convert(schema, entry, path)
      return converted ? converted.value : fieldFallback(schema)
    }
    case "nested":
      return bindShape(b, kind.shape, name, path)
    case "list":
      return bindList(b, schema, kind.element, kind.delimiter, name, path)
    case "map":
      return bindMap(b, schema, kind.value, name, path)
  }
}

function listIndexes(name: PropertyName, entries: ConfigEntry[]): number[] {
  const indexes = new Set<number>()

  for (const entry of entries) {
    const first = name.relative(entry.name)[0]
    if (first?.indexed && NUMERIC.test(first.canonical)) {
      indexes.add(Number(first.canonical))
    }
  }

  return [...indexes].sort((a, b) => a - b)
}

function bindList(
  b: Binding,
  schema: FieldSchema,
  element: FieldSchema,
  delimiter: string,
  name: PropertyName,
  path: string,
): unknown {
  const direct = b.source.find(name)
  const indexes = listIndexes(name, b.source.descendants(name))
  const elementKind = classifyField(element)

  // Indexed keys take precedence over a delimited value for the same field.
  if (indexes.length > 0) {
    if (direct) b.claim(direct)

    // Every element key stays claimed even after one fails to convert.
    let invalid = false
    const items: unknown[] = []
    for (const index of indexes) {
      const elementName = name.appendIndex(index)
      const elementPath = `${path}[${index}]`

      if (elementKind.kind === "nested") {
        items.push(bindShape(b, elementKind.shape, elementName, elementPath))
        continue
      }

      const entry = b.source.find(elementName)
      if (!entry) continue

      b.claim(entry)
      const converted = b.convert(element, entry, elementPath)
      if (converted) items.push(converted.value)
      else invalid = true
    }

    return invalid ? fieldFallback(schema) : items
  }

  if (!direct) return fieldFallback(schema)
  b.claim(direct)

  if (elementKind.kind === "nested") {
    b.reject(path, direct, "list<object>", "structured elements need indexed keys such as [0].field")
    return fieldFallback(schema)
  }

  const items: unknown[] = []
  const parts = direct.value
    .split(delimiter)
    .map((part) => part.trim())
    .filter((part) => part !== "")

  for (const part of parts) {
    const result = parseField(element, part)
    if (!result.ok) {
      b.reject(path, direct, `list<${fieldTypeName(element)}>`, `element "${part}": ${result.reason}`)
      return fieldFallback(schema)
    }
    items.push(result.value)
  }

  return items
}

/** Map keys keep their source spelling; a leading `[...]` loses its brackets. */
function mapKey(relative: readonly NameElement[]): string {
  const [first, ...rest] = relative
  if (!first) return ""

  return renderElements([{ ...first, indexed: false }, ...rest])
}

function bindMap(b: Binding, schema: FieldSchema, value: FieldSchema, name: PropertyName, path: string): unknown {
  const entries = b.source.descendants(name)
  if (entries.length === 0) return fieldFallback(schema)

  const valueKind = classifyField(value)

  if (valueKind.kind === "nested") {
    const groups = new Map<string, NameElement>()
    for (const entry of entries) {
      const first = name.relative(entry.name)[0]
      if (first && !groups.has(first.canonical)) groups.set(first.canonical, first)
    }

    return Object.fromEntries(
      [...groups.values()].map((element) => [
        element.original,
        bindShape(b, valueKind.shape, name.appendElement(element), fieldPath(path, element.original)),
      ]),
    )
  }

  const bound: Array<[string, unknown]> = []
  for (const entry of entries) {
    const key = mapKey(name.relative(entry.name))

    b.claim(entry)
    const converted = b.convert(value, entry, fieldPath(path, key))
    if (converted) bound.push([key, converted.value])
  }

  return Object.fromEntries(bound)
}

function isBound<S extends BindingSchema>(
  value: Record<string, unknown>,
  schema: S,
): value is Record<string, unknown> & Bound<S> {
  return Object.keys(schema.shape).every((field) => Object.hasOwn(value, field))
}

/**
 * Binds the keys under `spec.prefix` onto a new object shaped like `spec.schema`.
 *
 * Fields are bound in declaration order; keys left unclaimed are checked
 * afterwards. The first error ends the bind. The source is only read.
 */
export function tryBind<S extends BindingSchema>(source: ConfigSource, spec: BindingSpec<S>): BindResult<Bound<S>> {
  const b = new Binding(source, spec)
  const root = PropertyName.parse(spec.prefix)

  try {
    const value = bindShape(b, spec.schema.shape, root, "")

    if (!spec.ignoreUnknownFields) {
      const unknown = source.descendants(root).find((entry) => !b.isClaimed(entry))
      if (unknown) {
        throw new UnknownFieldError(unknown.key, spec.prefix, unknown.origin)
      }
    }

    if (!isBound(value, spec.schema)) {
      throw new Error(`Bound object for "${spec.name}" is missing fields`)
    }

    return { success: true, value }
  } catch (err) {
    if (err instanceof BindError) return { success: false, error: err }
    throw err
  }
}

/** Like `tryBind`, but throws the `BindError`. */
export function bind<S extends BindingSchema>(source: ConfigSource, spec: BindingSpec<S>): Bound<S> {
  const result = tryBind(source, spec)
  if (!result.success) throw result.error

  return result.value
}
