/**
 * Application Layer Index
 */

export { EventStore } from './event-store';
export { EnrollmentLedger } from './enrollment-ledger';
export {
  CrisisResponseEngine,
  type CrisisResponseEngineOptions
} from './crisis-response-engine';
export type { CrisisEngineDependencies } from './ports';
export {
  type EngineResponse,
  type ErrorResponse,
  mapErrorToResponse,
  toResponse,
  okResponse,
  toNumericCode
} from './dto';
