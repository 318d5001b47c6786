export type { Result, Ok, Err } from "./result.js";
export { ok, err, isOk, isErr, unwrap, map, mapErr } from "./result.js";

export {
  BaseError,
  ValidationError,
  InfrastructureError,
  ExternalServiceError,
  TimeoutError,
} from "./errors.js";
