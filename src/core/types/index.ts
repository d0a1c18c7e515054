export { type Brand, type CorrelationId, type ConnectionId, brand } from "./brand.js";
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  map,
  mapErr,
  flatMap,
  unwrapOr,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export {
  type OperationResult,
  type OperationSuccess,
  type OperationFailure,
  type OperationRequest,
  toOperationResult,
} from "./operation-result.js";
