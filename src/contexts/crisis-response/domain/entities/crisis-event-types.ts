import { z } from 'zod';
import { EventIdSchema } from '../../../../shared/types/index';

/**
 * Crisis Event Types
 *
 * 危機対応イベントの状態とスキーマ定義
 */

// === 状態 ===
export const EventStatusSchema = z.enum(['open', 'active', 'closed', 'cancelled']);
export const TerminalStatusSchema = z.enum(['closed', 'cancelled']);

export type EventStatus = z.infer<typeof EventStatusSchema>;
export type TerminalStatus = z.infer<typeof TerminalStatusSchema>;

export const isTerminalStatus = (status: EventStatus): status is TerminalStatus =>
  TerminalStatusSchema.safeParse(status).success;

// === イベント本体 ===
export const CrisisEventSchema = z.object({
  eventId: EventIdSchema,
  coordinator: z.string(),
  title: z.string(),
  description: z.string(),
  location: z.string(),
  startBlock: z.number().int(),
  endBlock: z.number().int().nullable(),
  status: EventStatusSchema,
  requiredSkills: z.array(z.string()).readonly(),
  maxVolunteers: z.number().int(),
  currentVolunteers: z.number().int().nonnegative(),
  createdAt: z.number().int(),
  tags: z.array(z.string()).readonly()
}).readonly();

export type CrisisEvent = z.infer<typeof CrisisEventSchema>;

// === 作成パラメータ ===
export const CreateEventParamsSchema = z.object({
  title: z.string(),
  description: z.string(),
  location: z.string(),
  startBlock: z.number().int(),
  endBlock: z.number().int().nullable().optional(),
  requiredSkills: z.array(z.string()),
  maxVolunteers: z.number().int(),
  tags: z.array(z.string())
});

export type CreateEventParams = z.infer<typeof CreateEventParamsSchema>;

/**
 * 更新パッチ
 *
 * 省略したフィールドは変更なし。空文字のテキストも変更なしとして扱う。
 * maxVolunteers と endBlock は作成時の検証を通さない。0以下の定員や
 * startBlock より前の終了ブロックもそのまま保存される
 */
export interface EventPatch {
  title?: string;
  description?: string;
  location?: string;
  endBlock?: number;
  maxVolunteers?: number;
  tags?: readonly string[];
}
