import {
  type EventId,
  type Principal,
  type Result,
  EventIdSchema,
  Ok,
  resultPipe
} from '../../../shared/types/index';
import type { EngineConfig } from '../../../shared/config/index';
import { getCurrentConfig } from '../../../shared/config/index';
import { type Logger, componentLogger, createLogger } from '../../../shared/logging/logger';
import { type CrisisError, notFoundFailure } from '../domain/errors/errors';
import type {
  CrisisEvent,
  CreateEventParams,
  EventPatch
} from '../domain/entities/crisis-event-types';
import type { CommandContext } from '../domain/aggregates/command-context';
import {
  validateCreateParams,
  openCrisisEvent,
  updateCrisisEvent,
  closeCrisisEvent,
  activateCrisisEvent
} from '../domain/aggregates/crisis-event-aggregate';
import type { ICrisisStateStore, StateReader, StateTransaction } from '../infrastructure/state/interfaces';
import type { CrisisEngineDependencies } from './ports';
import { logOutcome } from './operation-log';

/**
 * イベントの作成・更新・状態遷移を担う
 *
 * 各操作は論理時刻を1度だけ読み、単一のトランザクションとして実行する
 */
export class EventStore {
  private readonly store: ICrisisStateStore;
  private readonly config: EngineConfig;
  private readonly logger: Logger;

  constructor(private readonly deps: CrisisEngineDependencies) {
    this.store = deps.store;
    this.config = deps.config ?? getCurrentConfig();
    this.logger = componentLogger(
      deps.logger ?? createLogger({ level: this.config.observability.logging.level }),
      'event-store'
    );
  }

  create(caller: Principal, params: CreateEventParams): Result<EventId, CrisisError> {
    const context = this.context(caller);
    const result = this.store.transact((tx) =>
      resultPipe(validateCreateParams(params, context.now, this.config.limits))
        .map((validated) => {
          const event = openCrisisEvent(tx.allocateEventId(), validated, context);
          tx.putEvent(event);
          return event.eventId;
        })
        .value()
    );
    return this.log('create', context, result, {
      eventId: result.success ? result.data : undefined
    });
  }

  update(caller: Principal, eventId: number, patch: EventPatch = {}): Result<true, CrisisError> {
    return this.mutate('update', caller, eventId, (event, context) =>
      updateCrisisEvent(event, patch, context)
    );
  }

  closeOrCancel(caller: Principal, eventId: number, newStatus: string): Result<true, CrisisError> {
    return this.mutate('closeOrCancel', caller, eventId, (event, context) =>
      closeCrisisEvent(event, newStatus, context)
    );
  }

  activate(caller: Principal, eventId: number): Result<true, CrisisError> {
    return this.mutate('activate', caller, eventId, (event, context) =>
      activateCrisisEvent(event, context)
    );
  }

  // === Reads ===

  get(eventId: number): CrisisEvent | null {
    const parsed = EventIdSchema.safeParse(eventId);
    return parsed.success ? this.store.getEvent(parsed.data) : null;
  }

  count(): number {
    return this.store.lastEventId();
  }

  /**
   * 指定したリーダー（トランザクション含む）からイベントを解決する
   */
  resolve(reader: StateReader, eventId: number): Result<CrisisEvent, CrisisError> {
    const parsed = EventIdSchema.safeParse(eventId);
    const event = parsed.success ? reader.getEvent(parsed.data) : null;
    return event ? Ok(event) : notFoundFailure<CrisisEvent>('CrisisEvent', eventId);
  }

  /**
   * 現在時刻を1度だけ読み取ったコンテキスト
   */
  context(caller: Principal): CommandContext {
    return { caller, now: this.deps.clock.now() };
  }

  private mutate(
    operation: string,
    caller: Principal,
    eventId: number,
    transition: (event: CrisisEvent, context: CommandContext) => Result<CrisisEvent, CrisisError>
  ): Result<true, CrisisError> {
    const context = this.context(caller);
    const result = this.store.transact((tx: StateTransaction) =>
      resultPipe(this.resolve(tx, eventId))
        .flatMap((event) => transition(event, context))
        .map((next): true => {
          tx.putEvent(next);
          return true;
        })
        .value()
    );
    return this.log(operation, context, result, { eventId });
  }

  private log<T>(
    operation: string,
    context: CommandContext,
    result: Result<T, CrisisError>,
    fields: Record<string, unknown>
  ): Result<T, CrisisError> {
    return logOutcome(
      this.logger,
      this.config.observability.logging.enableAuditLog,
      operation,
      context,
      result,
      fields
    );
  }
}
