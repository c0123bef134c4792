import type { EventId, Principal } from '../../../shared/types/index';
import type { LogicalClock } from '../../../shared/clock/index';
import type { EngineConfig } from '../../../shared/config/index';
import type { Logger } from '../../../shared/logging/logger';
import type {
  CrisisEvent,
  CreateEventParams,
  EventPatch
} from '../domain/entities/crisis-event-types';
import type { EnrollmentRecord } from '../domain/entities/enrollment-types';
import type { JoinRequest } from '../domain/aggregates/enrollment-aggregate';
import type { ICrisisStateStore } from '../infrastructure/state/interfaces';
import { InMemoryCrisisStateStore } from '../infrastructure/state/in-memory-state-store';
import { EventStore } from './event-store';
import { EnrollmentLedger } from './enrollment-ledger';
import { type EngineResponse, okResponse, toResponse } from './dto';

export interface CrisisResponseEngineOptions {
  clock: LogicalClock;
  store?: ICrisisStateStore;
  logger?: Logger;
  config?: EngineConfig;
}

/**
 * 外部境界のファサード
 *
 * EventStoreとEnrollmentLedgerを同じ状態ストア・クロックの上に組み立てる
 */
export class CrisisResponseEngine {
  readonly events: EventStore;
  readonly enrollments: EnrollmentLedger;

  constructor(options: CrisisResponseEngineOptions) {
    const deps = {
      clock: options.clock,
      store: options.store ?? new InMemoryCrisisStateStore(),
      logger: options.logger,
      config: options.config
    };
    this.events = new EventStore(deps);
    this.enrollments = new EnrollmentLedger(this.events, deps);
  }

  // === Commands ===

  createEvent(caller: Principal, params: CreateEventParams): EngineResponse<EventId> {
    return toResponse(this.events.create(caller, params));
  }

  joinEvent(caller: Principal, eventId: number, request: JoinRequest): EngineResponse<true> {
    return toResponse(this.enrollments.join(caller, eventId, request));
  }

  leaveEvent(caller: Principal, eventId: number): EngineResponse<true> {
    return toResponse(this.enrollments.leave(caller, eventId));
  }

  updateEvent(caller: Principal, eventId: number, patch: EventPatch = {}): EngineResponse<true> {
    return toResponse(this.events.update(caller, eventId, patch));
  }

  closeOrCancelEvent(caller: Principal, eventId: number, newStatus: string): EngineResponse<true> {
    return toResponse(this.events.closeOrCancel(caller, eventId, newStatus));
  }

  activateEvent(caller: Principal, eventId: number): EngineResponse<true> {
    return toResponse(this.events.activate(caller, eventId));
  }

  // === Queries ===

  getEvent(eventId: number): EngineResponse<CrisisEvent | null> {
    return okResponse(this.events.get(eventId));
  }

  getEnrollment(eventId: number, participant: Principal): EngineResponse<EnrollmentRecord | null> {
    return okResponse(this.enrollments.getEnrollment(eventId, participant));
  }

  isJoined(eventId: number, participant: Principal): EngineResponse<boolean> {
    return okResponse(this.enrollments.isJoined(eventId, participant));
  }

  totalEvents(): EngineResponse<number> {
    return okResponse(this.events.count());
  }
}
