import { BootError, type ErrorCode } from "@bootkit/errors"

/** Errors a bind can end with; returned by `tryBind`, thrown by `bind`. */
export abstract class BindError<C extends ErrorCode = ErrorCode> extends BootError<C> {}

export class UnknownFieldError extends BindError<"unknown_field"> {
  constructor(
    readonly key: string,
    readonly prefix: string,
    origin?: string,
  ) {
    super(`No field is bound to configuration key "${key}" (prefix "${prefix}")`, {
      code: "unknown_field",
      context: { key, prefix, origin },
    })
  }
}

export type InvalidFieldDetails = Readonly<{
  field: string
  key: string
  value: string
  targetType: string
  reason: string
  origin?: string | undefined
}>

export class InvalidFieldError extends BindError<"invalid_field"> {
  readonly field: string
  readonly key: string
  readonly value: string
  readonly targetType: string

  constructor(details: InvalidFieldDetails) {
    super(
      `Failed to bind "${details.key}" to field "${details.field}": ` +
        `"${details.value}" is not a valid ${details.targetType} (${details.reason})`,
      { code: "invalid_field", context: { ...details } },
    )

    this.field = details.field
    this.key = details.key
    this.value = details.value
    this.targetType = details.targetType
  }
}

export class InvalidPrefixError extends BootError<"invalid_prefix"> {
  constructor(readonly prefix: string) {
    super(`Prefix "${prefix}" must be empty or dot-separated lower-case kebab elements`, {
      code: "invalid_prefix",
      context: { prefix },
      isOperational: false,
    })
  }
}

export class InvalidPropertyNameError extends BootError<"invalid_property_name"> {
  constructor(
    readonly key: string,
    reason: string,
  ) {
    super(`Invalid property name "${key}": ${reason}`, {
      code: "invalid_property_name",
      context: { key, reason },
    })
  }
}

/** A properties shape that cannot be bound, e.g. two fields with one canonical name. */
export class InvalidShapeError extends BootError<"invalid_shape"> {
  constructor(
    readonly field: string,
    reason: string,
  ) {
    super(`Invalid properties shape at "${field}": ${reason}`, {
      code: "invalid_shape",
      context: { field, reason },
      isOperational: false,
    })
  }
}

export class DuplicateSpecError extends BootError<"duplicate_binding"> {
  constructor(readonly specName: string) {
    super(`A binding named "${specName}" is already registered`, {
      code: "duplicate_binding",
      context: { name: specName },
      isOperational: false,
    })
  }
}

export class UnregisteredBindingError extends BootError<"unregistered_binding"> {
  constructor(readonly specName: string) {
    super(`Binding "${specName}" is not registered`, {
      code: "unregistered_binding",
      context: { name: specName },
      isOperational: false,
    })
  }
}

export class InvalidPropertyValueError extends BootError<"invalid_property_value"> {
  constructor(
    readonly key: string,
    readonly valueType: string,
  ) {
    super(`Property "${key}" has a ${valueType} value; only scalars, arrays and objects are supported`, {
      code: "invalid_property_value",
      context: { key, valueType },
    })
  }
}
