import type { Principal } from '../../../../shared/types/index';

/**
 * 1回の操作で使う呼び出し元と論理時刻。時刻は操作ごとに1度だけ読む
 */
export interface CommandContext {
  readonly caller: Principal;
  readonly now: number;
}

/**
 * 順序を保ったまま重複を除く
 */
export const uniqueTags = (tags: readonly string[]): readonly string[] =>
  [...new Set(tags)];
