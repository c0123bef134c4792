import { z } from 'zod';

/**
 * ブランド型定義
 *
 * ドメインの意味を持つ型安全な識別子
 */

// === 基本識別子 ===

/** イベント識別子: 1から始まる連番 */
export const EventIdSchema = z.number()
  .int()
  .positive()
  .brand<'EventId'>();

/** 論理クロック値（ブロック高） */
export const BlockHeightSchema = z.number()
  .int()
  .nonnegative()
  .brand<'BlockHeight'>();

export type EventId = z.infer<typeof EventIdSchema>;
export type BlockHeight = z.infer<typeof BlockHeightSchema>;

/**
 * 呼び出し元の識別子。比較可能であれば中身は問わない
 */
export type Principal = string;
