import { z } from 'zod';
import { EventIdSchema, type EventId, type Principal } from '../../../../shared/types/index';

/**
 * Enrollment Types
 *
 * レコードの存在そのものが「参加中」を表す。フラグは持たない
 */

export const EnrollmentRecordSchema = z.object({
  eventId: EventIdSchema,
  participant: z.string(),
  joinedAt: z.number().int(),
  role: z.string(),
  skillsProvided: z.array(z.string()).readonly()
}).readonly();

export type EnrollmentRecord = z.infer<typeof EnrollmentRecordSchema>;

export type EnrollmentKey = `${number}:${string}`;

/**
 * 複合キー (eventId, participant)
 */
export const enrollmentKey = (eventId: EventId, participant: Principal): EnrollmentKey =>
  `${eventId}:${participant}`;
