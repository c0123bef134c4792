import { EventIdSchema, type EventId, type Principal, type Result } from '../../../../shared/types/index';
import type { CrisisEvent } from '../../domain/entities/crisis-event-types';
import {
  type EnrollmentKey,
  type EnrollmentRecord,
  enrollmentKey
} from '../../domain/entities/enrollment-types';
import type {
  ICrisisStateStore,
  StateReader,
  StateStatistics,
  StateTransaction
} from './interfaces';

/**
 * In-Memory State Store実装
 *
 * 同期処理のみ。JavaScriptの単一スレッド上で各transactは直列に実行される
 */
export class InMemoryCrisisStateStore implements ICrisisStateStore {
  private readonly events = new Map<EventId, CrisisEvent>();
  private readonly enrollments = new Map<EnrollmentKey, EnrollmentRecord>();
  // イベントごとの参加レコード索引
  private readonly participantsByEvent = new Map<EventId, Set<Principal>>();
  private sequence = 0;
  private inTransaction = false;

  // === StateReader Implementation ===

  getEvent(eventId: EventId): CrisisEvent | null {
    return this.events.get(eventId) ?? null;
  }

  getEnrollment(eventId: EventId, participant: Principal): EnrollmentRecord | null {
    return this.enrollments.get(enrollmentKey(eventId, participant)) ?? null;
  }

  countEnrollments(eventId: EventId): number {
    return this.participantsByEvent.get(eventId)?.size ?? 0;
  }

  lastEventId(): number {
    return this.sequence;
  }

  // === Transaction ===

  transact<T, E>(work: (tx: StateTransaction) => Result<T, E>): Result<T, E> {
    if (this.inTransaction) {
      throw new Error('Nested transactions are not supported');
    }

    this.inTransaction = true;
    try {
      const tx = new StagedTransaction(this);
      const result = work(tx);
      if (result.success) {
        this.commit(tx);
      }
      return result;
    } finally {
      this.inTransaction = false;
    }
  }

  private commit(tx: StagedTransaction): void {
    for (const event of tx.stagedEvents.values()) {
      this.events.set(event.eventId, freezeEvent(event));
    }

    for (const [key, write] of tx.stagedEnrollments) {
      const participants = this.participantsByEvent.get(write.eventId) ?? new Set<Principal>();
      if (write.record === null) {
        this.enrollments.delete(key);
        participants.delete(write.participant);
      } else {
        this.enrollments.set(key, freezeRecord(write.record));
        participants.add(write.participant);
      }
      this.participantsByEvent.set(write.eventId, participants);
    }

    this.sequence = tx.stagedSequence;
  }

  // === Development/Testing Utilities ===

  getStatistics(): StateStatistics {
    const eventsByStatus: StateStatistics['eventsByStatus'] = {
      open: 0,
      active: 0,
      closed: 0,
      cancelled: 0
    };
    for (const event of this.events.values()) {
      eventsByStatus[event.status] += 1;
    }
    return {
      totalEvents: this.events.size,
      totalEnrollments: this.enrollments.size,
      eventsByStatus
    };
  }

  /**
   * 参加人数カウンタとレコード数が食い違うイベントIDの一覧（デバッグ用）
   */
  findCounterMismatches(): EventId[] {
    return Array.from(this.events.values())
      .filter((event) => event.currentVolunteers !== this.countEnrollments(event.eventId))
      .map((event) => event.eventId);
  }

  clear(): void {
    this.events.clear();
    this.enrollments.clear();
    this.participantsByEvent.clear();
    this.sequence = 0;
  }
}

// 確定済みの記録は呼び出し側から書き換えられない
const freezeEvent = (event: CrisisEvent): CrisisEvent =>
  Object.freeze({
    ...event,
    requiredSkills: Object.freeze([...event.requiredSkills]),
    tags: Object.freeze([...event.tags])
  });

const freezeRecord = (record: EnrollmentRecord): EnrollmentRecord =>
  Object.freeze({
    ...record,
    skillsProvided: Object.freeze([...record.skillsProvided])
  });

interface StagedEnrollmentWrite {
  eventId: EventId;
  participant: Principal;
  // nullは削除
  record: EnrollmentRecord | null;
}

/**
 * 書き込みをオーバーレイに溜め、読み取りはオーバーレイ→基底の順で解決する
 */
class StagedTransaction implements StateTransaction {
  readonly stagedEvents = new Map<EventId, CrisisEvent>();
  readonly stagedEnrollments = new Map<EnrollmentKey, StagedEnrollmentWrite>();
  stagedSequence: number;

  constructor(private readonly base: StateReader) {
    this.stagedSequence = base.lastEventId();
  }

  getEvent(eventId: EventId): CrisisEvent | null {
    return this.stagedEvents.get(eventId) ?? this.base.getEvent(eventId);
  }

  getEnrollment(eventId: EventId, participant: Principal): EnrollmentRecord | null {
    const staged = this.stagedEnrollments.get(enrollmentKey(eventId, participant));
    return staged ? staged.record : this.base.getEnrollment(eventId, participant);
  }

  countEnrollments(eventId: EventId): number {
    let count = this.base.countEnrollments(eventId);
    for (const write of this.stagedEnrollments.values()) {
      if (write.eventId !== eventId) continue;
      const existedBefore = this.base.getEnrollment(write.eventId, write.participant) !== null;
      if (write.record !== null && !existedBefore) count += 1;
      if (write.record === null && existedBefore) count -= 1;
    }
    return count;
  }

  lastEventId(): number {
    return this.stagedSequence;
  }

  allocateEventId(): EventId {
    this.stagedSequence += 1;
    return EventIdSchema.parse(this.stagedSequence);
  }

  putEvent(event: CrisisEvent): void {
    this.stagedEvents.set(event.eventId, event);
  }

  putEnrollment(record: EnrollmentRecord): void {
    this.stagedEnrollments.set(enrollmentKey(record.eventId, record.participant), {
      eventId: record.eventId,
      participant: record.participant,
      record
    });
  }

  deleteEnrollment(eventId: EventId, participant: Principal): void {
    this.stagedEnrollments.set(enrollmentKey(eventId, participant), {
      eventId,
      participant,
      record: null
    });
  }
}
