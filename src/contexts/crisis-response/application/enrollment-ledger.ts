import {
  type Principal,
  type Result,
  EventIdSchema,
  resultPipe
} from '../../../shared/types/index';
import type { EngineConfig } from '../../../shared/config/index';
import { getCurrentConfig } from '../../../shared/config/index';
import { type Logger, componentLogger, createLogger } from '../../../shared/logging/logger';
import type { CrisisError } from '../domain/errors/errors';
import type { EnrollmentRecord } from '../domain/entities/enrollment-types';
import {
  type JoinRequest,
  joinCrisisEvent,
  leaveCrisisEvent
} from '../domain/aggregates/enrollment-aggregate';
import type { ICrisisStateStore } from '../infrastructure/state/interfaces';
import type { CrisisEngineDependencies } from './ports';
import type { EventStore } from './event-store';
import { logOutcome } from './operation-log';

/**
 * ボランティアの参加・離脱を管理する
 *
 * 参加レコードの生成・削除とイベントの参加人数更新は同じトランザクションで確定する
 */
export class EnrollmentLedger {
  private readonly store: ICrisisStateStore;
  private readonly config: EngineConfig;
  private readonly logger: Logger;

  constructor(
    private readonly events: EventStore,
    deps: CrisisEngineDependencies
  ) {
    this.store = deps.store;
    this.config = deps.config ?? getCurrentConfig();
    this.logger = componentLogger(
      deps.logger ?? createLogger({ level: this.config.observability.logging.level }),
      'enrollment-ledger'
    );
  }

  join(caller: Principal, eventId: number, request: JoinRequest): Result<true, CrisisError> {
    const context = this.events.context(caller);
    const result = this.store.transact((tx) =>
      resultPipe(this.events.resolve(tx, eventId))
        .flatMap((event) =>
          joinCrisisEvent(
            event,
            tx.getEnrollment(event.eventId, caller),
            caller,
            request,
            context.now
          )
        )
        .map(({ event, record }): true => {
          tx.putEnrollment(record);
          tx.putEvent(event);
          return true;
        })
        .value()
    );
    return logOutcome(this.logger, this.config.observability.logging.enableAuditLog, 'join', context, result, {
      eventId,
      role: request.role
    });
  }

  leave(caller: Principal, eventId: number): Result<true, CrisisError> {
    const context = this.events.context(caller);
    const result = this.store.transact((tx) =>
      resultPipe(this.events.resolve(tx, eventId))
        .flatMap((event) =>
          resultPipe(leaveCrisisEvent(event, tx.getEnrollment(event.eventId, caller), caller, context.now))
            .map((next): true => {
              tx.deleteEnrollment(event.eventId, caller);
              tx.putEvent(next);
              return true;
            })
            .value()
        )
        .value()
    );
    return logOutcome(this.logger, this.config.observability.logging.enableAuditLog, 'leave', context, result, {
      eventId
    });
  }

  // === Reads ===

  getEnrollment(eventId: number, participant: Principal): EnrollmentRecord | null {
    const parsed = EventIdSchema.safeParse(eventId);
    return parsed.success ? this.store.getEnrollment(parsed.data, participant) : null;
  }

  /**
   * レコードの有無から導出する
   */
  isJoined(eventId: number, participant: Principal): boolean {
    return this.getEnrollment(eventId, participant) !== null;
  }
}
