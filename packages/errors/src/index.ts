export {
  BootError,
  type BootErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/boot-error"
export { errorChain, findCause } from "./core/utils/error-chain"
export { isStructuredError } from "./core/utils/is-structured-error"
export type {
  ErrorCode,
  ErrorContext,
  SerializedError,
  StructuredError,
} from "./ports/error"
