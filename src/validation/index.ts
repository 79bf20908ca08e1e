export type { BodyCheckResult, ResponseView } from "./types";
export type { HeaderSource, TransportFailure } from "./engine";
export {
  checkBodyText,
  decodeBody,
  enforceHttpsPolicy,
  evaluateResponse,
  hasBodyRules,
  recordTransportFailure,
  validateHeaders,
  validateResponse,
} from "./engine";
export { containsToken } from "./token";
