export type DurationUnit = "ns" | "us" | "ms" | "s" | "m" | "h" | "d"

const MS_PER_UNIT: Record<DurationUnit, number> = {
  ns: 1e-6,
  us: 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
}

const SIMPLE = /^([+-]?\d+)(ns|us|ms|s|m|h|d)?$/i
const ISO = /^([+-])?P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/i

function isUnit(value: string): value is DurationUnit {
  return value in MS_PER_UNIT
}

function parseIso(match: RegExpExecArray): number | undefined {
  const [, sign, days, hours, minutes, seconds] = match
  if (days === undefined && hours === undefined && minutes === undefined && seconds === undefined) {
    return undefined
  }

  const ms =
    Number(days ?? 0) * MS_PER_UNIT.d +
    Number(hours ?? 0) * MS_PER_UNIT.h +
    Number(minutes ?? 0) * MS_PER_UNIT.m +
    Number(seconds ?? 0) * MS_PER_UNIT.s

  return sign === "-" ? -ms : ms
}

/**
 * Parses a duration to milliseconds.
 *
 * Accepts `<amount><unit>` (`500ms`, `10s`, `2h`), ISO-8601 (`PT15M`, `P2D`,
 * `PT0.5S`) and bare integers, read in `defaultUnit`.
 *
 * @returns `undefined` when `text` is not a duration
 */
export function parseDuration(text: string, defaultUnit: DurationUnit = "ms"): number | undefined {
  const trimmed = text.trim()

  const simple = SIMPLE.exec(trimmed)
  if (simple) {
    const unit = (simple[2] ?? defaultUnit).toLowerCase()
    if (!isUnit(unit)) return undefined

    return Number(simple[1]) * MS_PER_UNIT[unit]
  }

  const iso = ISO.exec(trimmed)

  return iso ? parseIso(iso) : undefined
}
