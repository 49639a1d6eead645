import { z } from "zod"
import { type DurationUnit, parseDuration } from "./duration"
import { canonicalize } from "./property-name"

/** Any zod schema used as a field of a binding. Scalars receive the raw string value. */
export type FieldSchema = z.core.$ZodType

/** How the binder reads a field, after `.default()`, `.optional()` and `.nullable()` are unwrapped. */
export type FieldKind =
  | { kind: "scalar" }
  | { kind: "nested"; shape: z.core.$ZodShape }
  | { kind: "list"; element: FieldSchema; delimiter: string }
  | { kind: "map"; value: FieldSchema }

export type ListFormat = { delimiter: string }

/** Delimiters for single-value lists, keyed by the array schema. The default is ",". */
export const listFormats = z.registry<ListFormat>()

const INT = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i
const TRUTHY = ["true", "yes", "on", "1"]
const FALSY = ["false", "no", "off", "0"]

export function unwrapField(schema: FieldSchema): FieldSchema {
  if (schema instanceof z.ZodDefault || schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrapField(schema.unwrap())
  }

  return schema
}

export function classifyField(schema: FieldSchema): FieldKind {
  const inner = unwrapField(schema)

  if (inner instanceof z.ZodObject) return { kind: "nested", shape: inner.shape }
  if (inner instanceof z.ZodArray) {
    return { kind: "list", element: inner.element, delimiter: listFormats.get(inner)?.delimiter ?? "," }
  }
  if (inner instanceof z.ZodRecord) return { kind: "map", value: inner.valueType }

  return { kind: "scalar" }
}

/** Shown in `InvalidFieldError.targetType`: the schema's description, else its zod type. */
export function fieldTypeName(schema: FieldSchema): string {
  const inner = unwrapField(schema)
  if (inner instanceof z.ZodObject) return "object"

  return z.globalRegistry.get(inner)?.description ?? inner._zod.def.type
}

/** The value a field takes when no key is bound to it; copied on every call. */
export function fieldFallback(schema: FieldSchema): unknown {
  const result = z.safeParse(schema, undefined)

  return result.success ? structuredClone(result.data) : undefined
}

export type FieldParse = { ok: true; value: unknown } | { ok: false; reason: string }

export function parseField(schema: FieldSchema, raw: string): FieldParse {
  const result = z.safeParse(schema, raw)
  if (result.success) return { ok: true, value: result.data }

  return { ok: false, reason: result.error.issues[0]?.message ?? "invalid value" }
}

function int() {
  const reason = "expected a whole number within the safe integer range"

  return z
    .string()
    .trim()
    .regex(INT, { error: reason })
    .pipe(z.coerce.number<string>({ error: reason }).int({ error: reason }))
    .describe("int")
}

function number() {
  const reason = "expected a finite decimal number"

  return z
    .string()
    .trim()
    .regex(DECIMAL, { error: reason })
    .pipe(z.coerce.number({ error: reason }))
    .describe("number")
}

function boolean() {
  const words = [...TRUTHY, ...FALSY]

  return z
    .string()
    .trim()
    .toLowerCase()
    .refine((word) => words.includes(word), { error: `expected one of ${words.join(", ")}` })
    .transform((word) => TRUTHY.includes(word))
    .describe("boolean")
}

/** Milliseconds; bare numbers are read in `unit`. */
function duration(unit: DurationUnit = "ms") {
  return z
    .string()
    .transform((raw, ctx) => {
      const ms = parseDuration(raw, unit)
      if (ms !== undefined) return ms

      ctx.issues.push({ code: "custom", message: "expected a duration such as 500ms, 10s, 5m or PT1H", input: raw })
      return z.NEVER
    })
    .describe("duration")
}

/** Matches case-insensitively and ignores `-`/`_`, returning the declared spelling. */
function relaxedEnum<const V extends readonly [string, ...string[]]>(values: V) {
  return z
    .string()
    .transform((raw, ctx): V[number] => {
      const wanted = canonicalize(raw)
      const match = values.find((value) => canonicalize(value) === wanted)
      if (match !== undefined) return match

      ctx.issues.push({ code: "custom", message: `expected one of ${values.join(", ")}`, input: raw })
      return z.NEVER
    })
    .describe(`enum(${values.join("|")})`)
}

function list<E extends FieldSchema>(element: E, format?: Partial<ListFormat>) {
  const schema = z.array(element)
  if (format?.delimiter !== undefined) listFormats.add(schema, { delimiter: format.delimiter })

  return schema
}

/**
 * Zod schemas for values read from configuration text.
 *
 * Plain `z.string()`, `z.array()`, `z.record()` and `z.object()` work as
 * fields too; `fields.list` only adds a delimiter other than ",".
 *
 * @example
 * ```ts
 * const schema = z.object({
 *   url: z.string(),
 *   pool: z.object({
 *     maxSize: fields.int().default(10),
 *     idleTimeout: fields.duration().default(60_000),
 *   }),
 *   hosts: fields.list(z.string(), { delimiter: ";" }),
 * })
 * ```
 */
export const fields = {
  int,
  number,
  boolean,
  duration,
  enum: relaxedEnum,
  list,
}
