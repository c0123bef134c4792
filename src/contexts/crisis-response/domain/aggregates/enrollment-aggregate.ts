import {
  type Principal,
  type Result,
  Ok,
  resultPipe
} from '../../../../shared/types/index';
import {
  type CrisisError,
  createBusinessRuleError,
  createStateTransitionError,
  unauthorizedFailure,
  transitionFailure
} from '../errors/errors';
import type { CrisisEvent } from '../entities/crisis-event-types';
import type { EnrollmentRecord } from '../entities/enrollment-types';
import { uniqueTags } from './command-context';

/**
 * 参加登録集約
 *
 * 参加・離脱はレコードの生成・削除と参加人数の増減を一組で返す。
 * 書き込みは呼び出し側が同一トランザクションで確定させる
 */

export interface JoinRequest {
  readonly role: string;
  readonly skillsProvided: readonly string[];
}

export interface JoinOutcome {
  readonly event: CrisisEvent;
  readonly record: EnrollmentRecord;
}

/**
 * 1つでも共通のスキルがあれば一致（any-of）
 */
export const hasSkillOverlap = (
  required: readonly string[],
  provided: readonly string[]
): boolean => required.some((skill) => provided.includes(skill));

export function joinCrisisEvent(
  event: CrisisEvent,
  existing: EnrollmentRecord | null,
  participant: Principal,
  request: JoinRequest,
  now: number
): Result<JoinOutcome, CrisisError> {
  const skillsProvided = uniqueTags(request.skillsProvided);

  return resultPipe(Ok<CrisisEvent, CrisisError>(event))
    .filter(
      (current) => current.status === 'open',
      (current) => createStateTransitionError(
        'EVENT_CLOSED',
        current.status,
        `Event ${current.eventId} is ${current.status} and no longer accepts volunteers`
      )
    )
    .filter(
      (current) => current.currentVolunteers < current.maxVolunteers,
      (current) => createBusinessRuleError(
        'MAX_VOLUNTEERS_REACHED',
        'CAPACITY',
        `Event ${current.eventId} is full`,
        { maxVolunteers: current.maxVolunteers, currentVolunteers: current.currentVolunteers }
      )
    )
    .filter(
      () => existing === null,
      (current) => createBusinessRuleError(
        'ALREADY_JOINED',
        'ONE_ENROLLMENT_PER_PARTICIPANT',
        `${participant} has already joined event ${current.eventId}`
      )
    )
    .filter(
      (current) => hasSkillOverlap(current.requiredSkills, skillsProvided),
      (current) => createBusinessRuleError(
        'SKILL_MISMATCH',
        'SKILL_MATCH',
        `None of the offered skills match event ${current.eventId}`,
        { requiredSkills: current.requiredSkills, skillsProvided }
      )
    )
    .map((current): JoinOutcome => ({
      event: { ...current, currentVolunteers: current.currentVolunteers + 1 },
      record: {
        eventId: current.eventId,
        participant,
        joinedAt: now,
        role: request.role,
        skillsProvided
      }
    }))
    .value();
}

/**
 * 離脱は開始ブロックより前、かつopenの間だけ
 */
export function leaveCrisisEvent(
  event: CrisisEvent,
  existing: EnrollmentRecord | null,
  participant: Principal,
  now: number
): Result<CrisisEvent, CrisisError> {
  if (existing === null) {
    return unauthorizedFailure<CrisisEvent>(
      participant,
      `${participant} has not joined event ${event.eventId}`
    );
  }
  if (event.status !== 'open' || now >= event.startBlock) {
    return transitionFailure<CrisisEvent>(
      'NOT_STARTED',
      event.status,
      `Volunteers can only leave event ${event.eventId} before block ${event.startBlock} while it is open`
    );
  }
  const left: CrisisEvent = {
    ...event,
    currentVolunteers: event.currentVolunteers - 1
  };
  return Ok(left);
}
