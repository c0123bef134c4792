export * from './application/index';

export {
  type CrisisErrorCode,
  type CrisisError,
  type ValidationError,
  type NotFoundError,
  type AuthorizationError,
  type StateTransitionError,
  type BusinessRuleError,
  CrisisErrorCodeSchema,
  CrisisErrorSchema,
  NUMERIC_ERROR_CODES,
  isValidationError,
  isNotFoundError,
  isAuthorizationError,
  isStateTransitionError,
  isBusinessRuleError
} from './domain/errors/errors';

export {
  type CrisisEvent,
  type CreateEventParams,
  type EventPatch,
  type EventStatus,
  type TerminalStatus,
  CrisisEventSchema,
  CreateEventParamsSchema,
  EventStatusSchema,
  TerminalStatusSchema
} from './domain/entities/crisis-event-types';

export {
  type EnrollmentRecord,
  EnrollmentRecordSchema
} from './domain/entities/enrollment-types';

export { type JoinRequest, hasSkillOverlap } from './domain/aggregates/enrollment-aggregate';

export {
  type ICrisisStateStore,
  type StateReader,
  type StateTransaction,
  type StateStatistics
} from './infrastructure/state/interfaces';
export { InMemoryCrisisStateStore } from './infrastructure/state/in-memory-state-store';
