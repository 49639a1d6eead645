import type { z } from "zod"
import { InvalidPrefixError, InvalidShapeError } from "./errors"
import { classifyField, type FieldKind } from "./fields"
import { canonicalize } from "./property-name"

/** The object schema a binding materializes. */
export type BindingSchema = z.ZodObject<z.core.$ZodShape, z.core.$ZodObjectConfig>

type BoundField<F> =
  F extends z.ZodObject<infer Inner extends z.core.$ZodShape, z.core.$ZodObjectConfig>
    ? BoundShape<Inner>
    : F extends z.core.$ZodType
      ? undefined extends z.input<F>
        ? z.output<F>
        : z.output<F> | undefined
      : never

/** Nested objects are always present; a field without a default may be left unset. */
export type BoundShape<Sh extends z.core.$ZodShape> = { -readonly [K in keyof Sh]: BoundField<Sh[K]> }

export type Bound<S extends BindingSchema> = BoundShape<S["shape"]>

/**
 * Where and how an object schema is bound.
 *
 * Frozen once created; zod schemas are immutable values.
 */
export type BindingSpec<S extends BindingSchema = BindingSchema> = Readonly<{
  /** Identity in a `PropertiesRegistry`. Defaults to the prefix, or "root". */
  name: string
  /** Dot-separated lower-case kebab elements; empty binds at the root. */
  prefix: string
  schema: S
  /** @default true */
  ignoreUnknownFields: boolean
  /** @default false */
  ignoreInvalidFields: boolean
}>

export type BindingSpecOptions<S extends BindingSchema> = {
  prefix: string
  schema: S
  name?: string
  ignoreUnknownFields?: boolean
  ignoreInvalidFields?: boolean
}

const PREFIX_ELEMENT = /^[a-z0-9-]+$/

function validatePrefix(prefix: string): void {
  if (prefix === "") return

  for (const element of prefix.split(".")) {
    if (!PREFIX_ELEMENT.test(element) || canonicalize(element) === "") {
      throw new InvalidPrefixError(prefix)
    }
  }
}

/** The shape below a field, checking that lists and maps hold scalars or objects. */
function children(kind: FieldKind, path: string): z.core.$ZodShape | undefined {
  switch (kind.kind) {
    case "nested":
      return kind.shape
    case "list":
    case "map": {
      const element = classifyField(kind.kind === "list" ? kind.element : kind.value)
      if (element.kind === "list" || element.kind === "map") {
        throw new InvalidShapeError(path, `a ${kind.kind} cannot hold a ${element.kind}`)
      }

      return element.kind === "nested" ? element.shape : undefined
    }
    case "scalar":
      return undefined
  }
}

function validateShape(shape: z.core.$ZodShape, path: string): void {
  const seen = new Map<string, string>()

  for (const [field, schema] of Object.entries(shape)) {
    const fieldPath = path === "" ? field : `${path}.${field}`
    const canonical = canonicalize(field)

    if (canonical === "") {
      throw new InvalidShapeError(fieldPath, "field name has no letters or digits")
    }

    const clash = seen.get(canonical)
    if (clash !== undefined) {
      throw new InvalidShapeError(fieldPath, `binds the same keys as "${clash}"`)
    }
    seen.set(canonical, field)

    const nested = children(classifyField(schema), fieldPath)
    if (nested) validateShape(nested, fieldPath)
  }
}

/**
 * Creates a frozen `BindingSpec`.
 *
 * Throws `InvalidPrefixError` for a prefix that is not lower-case kebab, and
 * `InvalidShapeError` when a field name is empty, two fields of one object
 * fold to the same canonical name, or a list or map holds another list or map.
 *
 * @example
 * ```ts
 * const DataSourceProperties = defineBinding({
 *   prefix: "app.datasource",
 *   schema: z.object({ url: z.string(), maxPoolSize: fields.int().default(10) }),
 * })
 * ```
 */
export function defineBinding<S extends BindingSchema>(options: BindingSpecOptions<S>): BindingSpec<S> {
  validatePrefix(options.prefix)
  validateShape(options.schema.shape, "")

  return Object.freeze({
    name: options.name ?? (options.prefix === "" ? "root" : options.prefix),
    prefix: options.prefix,
    schema: options.schema,
    ignoreUnknownFields: options.ignoreUnknownFields ?? true,
    ignoreInvalidFields: options.ignoreInvalidFields ?? false,
  })
}
