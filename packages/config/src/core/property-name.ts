import { InvalidPropertyNameError } from "./errors"

/**
 * One element of a property name.
 *
 * Named elements compare by their canonical form (lower case, `[a-z0-9]`
 * only). Indexed elements come from `[...]` brackets: numeric ones are list
 * indexes, anything else is a literal map key compared verbatim.
 */
export type NameElement = Readonly<{
  original: string
  canonical: string
  indexed: boolean
}>

const NUMERIC = /^\d+$/

export function canonicalize(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]/g, "")
}

function named(original: string, key: string): NameElement {
  const canonical = canonicalize(original)

  if (canonical === "") {
    throw new InvalidPropertyNameError(key, `element "${original}" has no letters or digits`)
  }

  return { original, canonical, indexed: false }
}

function indexed(original: string): NameElement {
  const canonical = NUMERIC.test(original) ? String(Number.parseInt(original, 10)) : original

  return { original, canonical, indexed: true }
}

function render(elements: readonly NameElement[], form: "original" | "canonical"): string {
  let out = ""

  for (const element of elements) {
    if (element.indexed) {
      out += `[${element[form]}]`
    } else {
      out += out === "" ? element[form] : `.${element[form]}`
    }
  }

  return out
}

/**
 * A parsed, dot-separated configuration key.
 *
 * ```ts
 * PropertyName.parse("app.datasource.max-pool-size")
 *   .equals(PropertyName.parse("app.datasource.maxPoolSize")) // true
 * ```
 */
export class PropertyName {
  static readonly EMPTY = new PropertyName([])

  readonly canonical: string

  private constructor(readonly elements: readonly NameElement[]) {
    this.canonical = render(elements, "canonical")
  }

  /** Throws `InvalidPropertyNameError` for empty elements or unbalanced brackets. */
  static parse(key: string): PropertyName {
    if (key === "") return PropertyName.EMPTY

    const elements: NameElement[] = []
    let current = ""
    let i = 0

    while (i < key.length) {
      const ch = key.charAt(i)

      if (ch === ".") {
        if (current === "" && key.charAt(i - 1) !== "]") {
          throw new InvalidPropertyNameError(key, "empty element")
        }
        if (current !== "") elements.push(named(current, key))
        current = ""
        i++
        continue
      }

      if (ch === "[") {
        if (current !== "") elements.push(named(current, key))
        current = ""

        const close = key.indexOf("]", i + 1)
        if (close === -1) {
          throw new InvalidPropertyNameError(key, "unclosed '['")
        }

        const inner = key.slice(i + 1, close)
        if (inner === "") {
          throw new InvalidPropertyNameError(key, "empty index")
        }

        elements.push(indexed(inner))
        i = close + 1

        const next = key.charAt(i)
        if (next !== "" && next !== "." && next !== "[") {
          throw new InvalidPropertyNameError(key, `unexpected "${next}" after ']'`)
        }
        continue
      }

      if (ch === "]") {
        throw new InvalidPropertyNameError(key, "unexpected ']'")
      }

      current += ch
      i++
    }

    if (current !== "") {
      elements.push(named(current, key))
    } else if (key.endsWith(".")) {
      throw new InvalidPropertyNameError(key, "empty element")
    }

    return new PropertyName(elements)
  }

  static tryParse(key: string): PropertyName | undefined {
    try {
      return PropertyName.parse(key)
    } catch (err) {
      if (err instanceof InvalidPropertyNameError) return undefined
      throw err
    }
  }

  get isEmpty(): boolean {
    return this.elements.length === 0
  }

  get length(): number {
    return this.elements.length
  }

  /** Appends a named element, e.g. a field name. */
  append(field: string): PropertyName {
    const key = this.isEmpty ? field : `${this.toString()}.${field}`

    return new PropertyName([...this.elements, named(field, key)])
  }

  appendIndex(index: number): PropertyName {
    return new PropertyName([...this.elements, indexed(String(index))])
  }

  appendElement(element: NameElement): PropertyName {
    return new PropertyName([...this.elements, element])
  }

  equals(other: PropertyName): boolean {
    return this.canonical === other.canonical
  }

  /** True when `other` lies strictly below this name. */
  isAncestorOf(other: PropertyName): boolean {
    if (other.elements.length <= this.elements.length) return false

    return this.elements.every((element, i) => sameElement(element, other.elements[i]))
  }

  /** Elements of `descendant` below this name; empty when it is not a descendant. */
  relative(descendant: PropertyName): readonly NameElement[] {
    return this.isAncestorOf(descendant) ? descendant.elements.slice(this.elements.length) : []
  }

  toString(): string {
    return render(this.elements, "original")
  }
}

function sameElement(a: NameElement, b: NameElement | undefined): boolean {
  return b !== undefined && a.indexed === b.indexed && a.canonical === b.canonical
}

export function renderElements(elements: readonly NameElement[]): string {
  return render(elements, "original")
}
