export {
  type AppError,
  ErrorKind,
  InvalidConfigError,
  appError,
  isRetriable,
  validation,
  rateLimited,
  circuitOpen,
  connectionFailed,
  timedOut,
  retryExhausted,
  httpStatusError,
  dispatchError,
  operationFailed,
  describeError,
} from "./app-error.js";
