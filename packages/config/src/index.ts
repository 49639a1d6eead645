export { EnvSource, type EnvSourceOptions, envNameToKey } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export {
  PropertiesFileSource,
  type PropertiesFileSourceOptions,
} from "./adapters/properties-file/properties-file-source"
export { type BindResult, bind, tryBind } from "./core/binder"
export {
  type Bound,
  type BindingSchema,
  type BindingSpec,
  type BindingSpecOptions,
  type BoundShape,
  defineBinding,
} from "./core/binding-spec"
export { ConfigSnapshot, createConfigSource, type PropertyInput } from "./core/config-snapshot"
export { type DurationUnit, parseDuration } from "./core/duration"
export {
  BindError,
  DuplicateSpecError,
  type InvalidFieldDetails,
  InvalidFieldError,
  InvalidPrefixError,
  InvalidPropertyNameError,
  InvalidPropertyValueError,
  InvalidShapeError,
  UnknownFieldError,
  UnregisteredBindingError,
} from "./core/errors"
export { type FieldSchema, fields, type ListFormat, listFormats } from "./core/fields"
export { type LoadConfigSourceOptions, loadConfigSource } from "./core/load"
export { canonicalize, type NameElement, PropertyName } from "./core/property-name"
export { BoundProperties, PropertiesRegistry } from "./core/registry"
export { flattenProperties } from "./core/utils/flatten-properties"
export type { ConfigEntry, ConfigSource } from "./ports/config-source"
export type { PropertySource } from "./ports/source"
