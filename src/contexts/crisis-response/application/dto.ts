import { type Result, match } from '../../../shared/types/index';
import {
  type CrisisError,
  type CrisisErrorCode,
  NUMERIC_ERROR_CODES
} from '../domain/errors/errors';

/**
 * 境界レスポンス
 *
 * 失敗は列挙可能なコードのみを返す。呼び出し側はコードで分岐する
 */
export type EngineResponse<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly code: CrisisErrorCode };

export type ErrorResponse = Extract<EngineResponse<never>, { ok: false }>;

export const mapErrorToResponse = (error: CrisisError): ErrorResponse => ({
  ok: false,
  code: error.code
});

export const toResponse = <T>(result: Result<T, CrisisError>): EngineResponse<T> =>
  match<T, CrisisError, EngineResponse<T>>(result, {
    success: (value) => ({ ok: true, value }),
    error: mapErrorToResponse
  });

export const okResponse = <T>(value: T): EngineResponse<T> => ({ ok: true, value });

/**
 * 旧コントラクト互換の数値コード
 */
export const toNumericCode = (code: CrisisErrorCode): number => NUMERIC_ERROR_CODES[code];
