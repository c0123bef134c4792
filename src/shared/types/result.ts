import type { z } from 'zod';

/**
 * Result型 - 関数型エラーハンドリングの基盤
 *
 * - 例外ではなく値としてエラーを扱う
 * - 型システムでエラーハンドリングを強制
 */

export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

// === ファクトリ関数 ===

export const Ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data
});

export const Err = <T = never, E = Error>(error: E): Result<T, E> => ({
  success: false,
  error
});

// === 基本的なResult型操作 ===

/**
 * 成功値を変換する（Functor）
 */
export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U
): Result<U, E> => {
  return result.success ? Ok(fn(result.data)) : result;
};

/**
 * Result型を返す関数でチェーン（Monad）
 */
export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>
): Result<U, E> => {
  return result.success ? fn(result.data) : result;
};

export const mapError = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> => {
  return result.success ? result : Err(fn(result.error));
};

/**
 * パターンマッチング
 */
export const match = <T, E, U>(
  result: Result<T, E>,
  matcher: {
    success: (data: T) => U;
    error: (error: E) => U;
  }
): U => {
  return result.success
    ? matcher.success(result.data)
    : matcher.error(result.error);
};

/**
 * 最初に失敗したものを返す。全て成功ならundefined
 */
export const firstFailure = <E>(
  results: ReadonlyArray<Result<unknown, E>>
): Result<never, E> | undefined => {
  for (const result of results) {
    if (!result.success) {
      return result;
    }
  }
  return undefined;
};

/**
 * Zodスキーマを使った安全なパース
 */
export const parseWith = <T, E>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  toError: (zodError: z.ZodError) => E
): Result<T, E> => {
  const parseResult = schema.safeParse(data);
  return parseResult.success
    ? Ok(parseResult.data)
    : Err(toError(parseResult.error));
};
