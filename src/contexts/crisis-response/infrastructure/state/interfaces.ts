import type { Result, EventId, Principal } from '../../../../shared/types/index';
import type { CrisisEvent } from '../../domain/entities/crisis-event-types';
import type { EnrollmentRecord } from '../../domain/entities/enrollment-types';

/**
 * 状態ストアのインターフェース
 *
 * イベント・参加レコード・連番の3つを一つの一貫性境界として扱う
 */

export interface StateReader {
  getEvent(eventId: EventId): CrisisEvent | null;
  getEnrollment(eventId: EventId, participant: Principal): EnrollmentRecord | null;
  countEnrollments(eventId: EventId): number;
  lastEventId(): number;
}

export interface StateTransaction extends StateReader {
  /** 次の連番を確保する。コミットされた場合のみ消費される */
  allocateEventId(): EventId;
  putEvent(event: CrisisEvent): void;
  putEnrollment(record: EnrollmentRecord): void;
  deleteEnrollment(eventId: EventId, participant: Principal): void;
}

export interface ICrisisStateStore extends StateReader {
  /**
   * workが成功を返した場合のみ全ての書き込みを反映する。
   * 失敗・例外の場合は何も反映しない
   */
  transact<T, E>(work: (tx: StateTransaction) => Result<T, E>): Result<T, E>;
}

export interface StateStatistics {
  totalEvents: number;
  totalEnrollments: number;
  eventsByStatus: Record<CrisisEvent['status'], number>;
}
