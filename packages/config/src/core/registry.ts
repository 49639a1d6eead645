import type { ConfigSource } from "../ports/config-source"
import { bind } from "./binder"
import type { Bound, BindingSchema, BindingSpec } from "./binding-spec"
import { DuplicateSpecError, UnregisteredBindingError } from "./errors"

/**
 * Properties bound from one `ConfigSource`.
 *
 * Every registered spec was bound successfully when this was created;
 * `get` binds again and returns a fresh object on each call.
 */
export class BoundProperties {
  constructor(
    readonly source: ConfigSource,
    private readonly specs: ReadonlySet<BindingSpec>,
  ) {}

  static empty(source: ConfigSource): BoundProperties {
    return new BoundProperties(source, new Set())
  }

  has(spec: BindingSpec): boolean {
    return this.specs.has(spec)
  }

  /** Throws `UnregisteredBindingError` for a spec that was not bound with the others. */
  get<S extends BindingSchema>(spec: BindingSpec<S>): Bound<S> {
    if (!this.specs.has(spec)) {
      throw new UnregisteredBindingError(spec.name)
    }

    return bind(this.source, spec)
  }
}

/** The set of bindings an application enables. */
export class PropertiesRegistry {
  private readonly byName = new Map<string, BindingSpec>()

  /** Throws `DuplicateSpecError` when a spec with the same name is registered. */
  register<S extends BindingSchema>(spec: BindingSpec<S>): BindingSpec<S> {
    if (this.byName.has(spec.name)) {
      throw new DuplicateSpecError(spec.name)
    }

    this.byName.set(spec.name, spec)
    return spec
  }

  specs(): BindingSpec[] {
    return [...this.byName.values()]
  }

  /** Binds every spec in registration order; the first `BindError` is thrown. */
  bindAll(source: ConfigSource): BoundProperties {
    const specs = this.specs()

    for (const spec of specs) {
      bind(source, spec)
    }

    return new BoundProperties(source, new Set(specs))
  }
}
