import { describe, test, expect } from 'vitest';
import {
  hasSkillOverlap,
  joinCrisisEvent,
  leaveCrisisEvent
} from '../../src/contexts/crisis-response/domain/aggregates/enrollment-aggregate';
import {
  isBusinessRuleError,
  isStateTransitionError,
  isAuthorizationError
} from '../../src/contexts/crisis-response/domain/errors/errors';
import type { EnrollmentRecord } from '../../src/contexts/crisis-response/domain/entities/enrollment-types';
import { accounts } from '../helpers/fixtures';
import { openEvent } from '../helpers/events';

const medic = { role: 'Medic', skillsProvided: ['medical'] };

function existingRecord(): EnrollmentRecord {
  const joined = joinCrisisEvent(openEvent(), null, accounts.volunteer1, medic, 1001);
  if (!joined.success) {
    throw new Error('fixture join failed');
  }
  return joined.data.record;
}

describe('参加登録集約', () => {
  describe('hasSkillOverlap', () => {
    test('1つでも共通していれば一致', () => {
      expect(hasSkillOverlap(['medical', 'logistics'], ['medical'])).toBe(true);
    });

    test('共通のスキルがなければ不一致', () => {
      expect(hasSkillOverlap(['medical', 'logistics'], ['driving'])).toBe(false);
    });

    test('必要スキルが空なら誰も一致しない', () => {
      expect(hasSkillOverlap([], ['medical'])).toBe(false);
    });
  });

  describe('joinCrisisEvent', () => {
    test('参加レコードを作り参加人数を1増やす', () => {
      const event = openEvent();
      const result = joinCrisisEvent(
        event,
        null,
        accounts.volunteer1,
        { role: 'Medic', skillsProvided: ['medical', 'medical', 'driving'] },
        1004
      );

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.event).toEqual({ ...event, currentVolunteers: 1 });
        expect(result.data.record).toEqual({
          eventId: 1,
          participant: 'volunteer1',
          joinedAt: 1004,
          role: 'Medic',
          skillsProvided: ['medical', 'driving']
        });
      }
    });

    test('openでないイベントには参加できない', () => {
      const result = joinCrisisEvent(openEvent({}, { status: 'active' }), null, accounts.volunteer1, medic, 1011);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(isStateTransitionError(result.error)).toBe(true);
        expect(result.error.code).toBe('EVENT_CLOSED');
      }
    });

    test('定員に達していれば参加できない', () => {
      const result = joinCrisisEvent(
        openEvent({ maxVolunteers: 1 }, { currentVolunteers: 1 }),
        null,
        accounts.volunteer2,
        medic,
        1001
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(isBusinessRuleError(result.error)).toBe(true);
        expect(result.error.code).toBe('MAX_VOLUNTEERS_REACHED');
      }
    });

    test('既に参加していれば拒否する', () => {
      const result = joinCrisisEvent(
        openEvent({}, { currentVolunteers: 1 }),
        existingRecord(),
        accounts.volunteer1,
        medic,
        1002
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('ALREADY_JOINED');
      }
    });

    test('スキルが一致しなければ参加できない', () => {
      const result = joinCrisisEvent(
        openEvent(),
        null,
        accounts.volunteer1,
        { role: 'Driver', skillsProvided: ['driving'] },
        1001
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('SKILL_MISMATCH');
      }
    });

    test('状態の確認は定員の確認より先', () => {
      const result = joinCrisisEvent(
        openEvent({ maxVolunteers: 1 }, { status: 'closed', currentVolunteers: 1 }),
        null,
        accounts.volunteer2,
        medic,
        1001
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('EVENT_CLOSED');
      }
    });

    test('定員の確認はスキルの確認より先', () => {
      const result = joinCrisisEvent(
        openEvent({ maxVolunteers: 1 }, { currentVolunteers: 1 }),
        null,
        accounts.volunteer2,
        { role: 'Driver', skillsProvided: ['driving'] },
        1001
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('MAX_VOLUNTEERS_REACHED');
      }
    });
  });

  describe('leaveCrisisEvent', () => {
    test('開始前なら離脱でき参加人数を1減らす', () => {
      const event = openEvent({}, { currentVolunteers: 1 });
      const result = leaveCrisisEvent(event, existingRecord(), accounts.volunteer1, 1005);

      expect(result).toEqual({ success: true, data: { ...event, currentVolunteers: 0 } });
    });

    test('参加していなければ拒否する', () => {
      const result = leaveCrisisEvent(openEvent(), null, accounts.volunteer1, 1005);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(isAuthorizationError(result.error)).toBe(true);
        expect(result.error.code).toBe('UNAUTHORIZED');
      }
    });

    test('開始ブロック到達後は離脱できない', () => {
      const result = leaveCrisisEvent(
        openEvent({}, { currentVolunteers: 1 }),
        existingRecord(),
        accounts.volunteer1,
        1010
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_STARTED');
      }
    });

    test('離脱の拒否はそれぞれの種別のエラーとして返る', () => {
      const notJoined = leaveCrisisEvent(openEvent(), null, accounts.volunteer2, 1005);
      const tooLate = leaveCrisisEvent(
        openEvent({}, { currentVolunteers: 1 }),
        existingRecord(),
        accounts.volunteer1,
        1010
      );

      expect(notJoined).toEqual({
        success: false,
        error: {
          type: 'AuthorizationError',
          code: 'UNAUTHORIZED',
          principal: 'volunteer2',
          message: 'volunteer2 has not joined event 1'
        }
      });
      expect(tooLate.success).toBe(false);
      if (!tooLate.success) {
        expect(isStateTransitionError(tooLate.error)).toBe(true);
        expect(tooLate.error).toMatchObject({
          code: 'NOT_STARTED',
          from: 'open',
          message: 'Volunteers can only leave event 1 before block 1010 while it is open'
        });
      }
    });

    test('openでなければ開始前でも離脱できない', () => {
      const result = leaveCrisisEvent(
        openEvent({}, { status: 'cancelled', currentVolunteers: 1 }),
        existingRecord(),
        accounts.volunteer1,
        1005
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_STARTED');
      }
    });
  });
});
