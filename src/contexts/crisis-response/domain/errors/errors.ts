import { z } from 'zod';
import type { Result } from '../../../../shared/types/index';
import { Err } from '../../../../shared/types/index';

// === 安定したエラーコード ===
export const CrisisErrorCodeSchema = z.enum([
  'UNAUTHORIZED',
  'INVALID_EVENT',
  'EVENT_CLOSED',
  'MAX_VOLUNTEERS_REACHED',
  'ALREADY_JOINED',
  'INVALID_STATUS',
  'INVALID_PARAMS',
  'NOT_STARTED',
  'SKILL_MISMATCH'
]);

export type CrisisErrorCode = z.infer<typeof CrisisErrorCodeSchema>;

/**
 * 旧コントラクトの数値エラーコードとの対応表
 */
export const NUMERIC_ERROR_CODES: Readonly<Record<CrisisErrorCode, number>> = {
  UNAUTHORIZED: 100,
  INVALID_EVENT: 101,
  EVENT_CLOSED: 102,
  MAX_VOLUNTEERS_REACHED: 103,
  ALREADY_JOINED: 104,
  INVALID_STATUS: 105,
  INVALID_PARAMS: 106,
  NOT_STARTED: 107,
  SKILL_MISMATCH: 109
};

// === 基底エラースキーマ ===
export const DomainErrorBaseSchema = z.object({
  type: z.string(),
  message: z.string(),
  code: CrisisErrorCodeSchema,
  details: z.record(z.unknown()).optional()
});

// === 検証エラー（入力値の問題） ===
export const ValidationErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('ValidationError'),
  code: z.literal('INVALID_PARAMS'),
  field: z.string().optional(),
  value: z.unknown().optional()
});

// === 存在しないイベント ===
export const NotFoundErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('NotFoundError'),
  code: z.literal('INVALID_EVENT'),
  entity: z.string(),
  id: z.string()
});

// === 呼び出し元・時間窓・状態の不一致による拒否 ===
export const AuthorizationErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('AuthorizationError'),
  code: z.literal('UNAUTHORIZED'),
  principal: z.string()
});

// === 状態機械の違反 ===
export const StateTransitionErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('StateTransitionError'),
  code: z.enum(['EVENT_CLOSED', 'INVALID_STATUS', 'NOT_STARTED']),
  from: z.string(),
  to: z.string().optional()
});

// === 参加に関するビジネスルール違反 ===
export const BusinessRuleErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('BusinessRuleError'),
  code: z.enum(['MAX_VOLUNTEERS_REACHED', 'ALREADY_JOINED', 'SKILL_MISMATCH']),
  rule: z.string(),
  context: z.record(z.unknown()).optional()
});

// === 統合エラー型（Discriminated Union） ===
export const CrisisErrorSchema = z.discriminatedUnion('type', [
  ValidationErrorSchema,
  NotFoundErrorSchema,
  AuthorizationErrorSchema,
  StateTransitionErrorSchema,
  BusinessRuleErrorSchema
]);

export type ValidationError = z.infer<typeof ValidationErrorSchema>;
export type NotFoundError = z.infer<typeof NotFoundErrorSchema>;
export type AuthorizationError = z.infer<typeof AuthorizationErrorSchema>;
export type StateTransitionError = z.infer<typeof StateTransitionErrorSchema>;
export type BusinessRuleError = z.infer<typeof BusinessRuleErrorSchema>;
export type CrisisError = z.infer<typeof CrisisErrorSchema>;

// === エラーファクトリ関数 ===
export const createValidationError = (
  message: string,
  field?: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  code: 'INVALID_PARAMS',
  field,
  value
});

export const createNotFoundError = (
  entity: string,
  id: string | number
): NotFoundError => ({
  type: 'NotFoundError',
  message: `${entity} with id ${id} not found`,
  code: 'INVALID_EVENT',
  entity,
  id: String(id)
});

export const createAuthorizationError = (
  principal: string,
  message: string,
  details?: Record<string, unknown>
): AuthorizationError => ({
  type: 'AuthorizationError',
  message,
  code: 'UNAUTHORIZED',
  principal,
  details
});

export const createStateTransitionError = (
  code: StateTransitionError['code'],
  from: string,
  message: string,
  to?: string
): StateTransitionError => ({
  type: 'StateTransitionError',
  message,
  code,
  from,
  to
});

export const createBusinessRuleError = (
  code: BusinessRuleError['code'],
  rule: string,
  message: string,
  context?: Record<string, unknown>
): BusinessRuleError => ({
  type: 'BusinessRuleError',
  message,
  code,
  rule,
  context
});

// === エラー分析ヘルパー ===
export const isValidationError = (error: CrisisError): error is ValidationError =>
  error.type === 'ValidationError';

export const isNotFoundError = (error: CrisisError): error is NotFoundError =>
  error.type === 'NotFoundError';

export const isAuthorizationError = (error: CrisisError): error is AuthorizationError =>
  error.type === 'AuthorizationError';

export const isStateTransitionError = (error: CrisisError): error is StateTransitionError =>
  error.type === 'StateTransitionError';

export const isBusinessRuleError = (error: CrisisError): error is BusinessRuleError =>
  error.type === 'BusinessRuleError';

// === Result型用のエラーファクトリ関数 ===
export const validationFailure = <T>(
  message: string,
  field?: string,
  value?: unknown
): Result<T, CrisisError> => Err(createValidationError(message, field, value));

export const notFoundFailure = <T>(
  entity: string,
  id: string | number
): Result<T, CrisisError> => Err(createNotFoundError(entity, id));

export const unauthorizedFailure = <T>(
  principal: string,
  message: string,
  details?: Record<string, unknown>
): Result<T, CrisisError> => Err(createAuthorizationError(principal, message, details));

export const transitionFailure = <T>(
  code: StateTransitionError['code'],
  from: string,
  message: string,
  to?: string
): Result<T, CrisisError> => Err(createStateTransitionError(code, from, message, to));
