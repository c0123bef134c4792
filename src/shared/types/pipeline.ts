import { type Result, Err, map, flatMap, mapError } from './result';

/**
 * Result型専用パイプライン - エラーが発生すると途中で停止
 */
export interface ResultPipe<T, E> {
  map<U>(fn: (data: T) => U): ResultPipe<U, E>;
  flatMap<U>(fn: (data: T) => Result<U, E>): ResultPipe<U, E>;
  mapError<F>(fn: (error: E) => F): ResultPipe<T, F>;
  filter(predicate: (data: T) => boolean, errorOnFalse: (data: T) => E): ResultPipe<T, E>;
  value(): Result<T, E>;
}

export function resultPipe<T, E>(initial: Result<T, E>): ResultPipe<T, E> {
  return {
    map<U>(fn: (data: T) => U) {
      return resultPipe(map(initial, fn));
    },
    flatMap<U>(fn: (data: T) => Result<U, E>) {
      return resultPipe(flatMap(initial, fn));
    },
    mapError<F>(fn: (error: E) => F) {
      return resultPipe(mapError(initial, fn));
    },
    filter(predicate: (data: T) => boolean, errorOnFalse: (data: T) => E) {
      if (!initial.success || predicate(initial.data)) {
        return resultPipe(initial);
      }
      return resultPipe(Err<T, E>(errorOnFalse(initial.data)));
    },
    value(): Result<T, E> {
      return initial;
    }
  };
}
