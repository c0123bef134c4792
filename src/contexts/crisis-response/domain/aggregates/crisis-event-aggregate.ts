import {
  type EventId,
  type Result,
  Ok,
  ResultUtils,
  resultPipe
} from '../../../../shared/types/index';
import type { LimitsConfig } from '../../../../shared/config/index';
import {
  type CrisisError,
  createValidationError,
  validationFailure,
  unauthorizedFailure,
  transitionFailure
} from '../errors/errors';
import {
  type CrisisEvent,
  type CreateEventParams,
  type EventPatch,
  type TerminalStatus,
  CreateEventParamsSchema,
  TerminalStatusSchema,
  isTerminalStatus
} from '../entities/crisis-event-types';
import { type CommandContext, uniqueTags } from './command-context';

/**
 * 危機対応イベント集約
 *
 * 全て純粋関数。状態変更は新しいオブジェクトとして返す
 */

export interface ValidatedEventParams {
  readonly title: string;
  readonly description: string;
  readonly location: string;
  readonly startBlock: number;
  readonly endBlock: number | null;
  readonly requiredSkills: readonly string[];
  readonly maxVolunteers: number;
  readonly tags: readonly string[];
}

// === 作成 ===

/**
 * 作成パラメータの一括検証
 *
 * IDはここでは割り当てない。検証に失敗した呼び出しは連番を消費しない
 */
export function validateCreateParams(
  params: CreateEventParams,
  now: number,
  limits: LimitsConfig
): Result<ValidatedEventParams, CrisisError> {
  return resultPipe(
    ResultUtils.parseWith<CreateEventParams, CrisisError>(CreateEventParamsSchema, params, (zodError) => {
      const issue = zodError.issues[0];
      return createValidationError(
        issue?.message ?? 'Malformed event parameters',
        issue?.path.join('.')
      );
    })
  )
    .map((parsed): ValidatedEventParams => ({
      title: parsed.title,
      description: parsed.description,
      location: parsed.location,
      startBlock: parsed.startBlock,
      endBlock: parsed.endBlock ?? null,
      requiredSkills: uniqueTags(parsed.requiredSkills),
      maxVolunteers: parsed.maxVolunteers,
      tags: uniqueTags(parsed.tags)
    }))
    .flatMap((validated): Result<ValidatedEventParams, CrisisError> => {
      const failure = ResultUtils.firstFailure(creationRules(validated, now, limits));
      return failure ?? Ok(validated);
    })
    .value();
}

function creationRules(
  params: ValidatedEventParams,
  now: number,
  limits: LimitsConfig
): Result<void, CrisisError>[] {
  const rule = (ok: boolean, message: string, field: string, value: unknown): Result<void, CrisisError> =>
    ok ? Ok(undefined) : validationFailure<void>(message, field, value);

  return [
    rule(params.title.length > 0, 'Title must not be empty', 'title', params.title),
    rule(params.description.length > 0, 'Description must not be empty', 'description', params.description),
    rule(
      params.startBlock > now,
      `Start block ${params.startBlock} must be after current block ${now}`,
      'startBlock',
      params.startBlock
    ),
    rule(
      params.endBlock === null || params.endBlock >= params.startBlock,
      'End block must not precede start block',
      'endBlock',
      params.endBlock
    ),
    rule(params.maxVolunteers > 0, 'Capacity must be positive', 'maxVolunteers', params.maxVolunteers),
    rule(
      params.title.length <= limits.maxTitleLength,
      `Title exceeds ${limits.maxTitleLength} characters`,
      'title',
      params.title.length
    ),
    rule(
      params.description.length <= limits.maxDescriptionLength,
      `Description exceeds ${limits.maxDescriptionLength} characters`,
      'description',
      params.description.length
    ),
    rule(
      params.location.length <= limits.maxLocationLength,
      `Location exceeds ${limits.maxLocationLength} characters`,
      'location',
      params.location.length
    ),
    rule(
      params.requiredSkills.length <= limits.maxRequiredSkills,
      `At most ${limits.maxRequiredSkills} required skills are allowed`,
      'requiredSkills',
      params.requiredSkills.length
    ),
    rule(
      params.tags.length <= limits.maxTags,
      `At most ${limits.maxTags} tags are allowed`,
      'tags',
      params.tags.length
    )
  ];
}

export function openCrisisEvent(
  eventId: EventId,
  params: ValidatedEventParams,
  context: CommandContext
): CrisisEvent {
  return {
    eventId,
    coordinator: context.caller,
    ...params,
    status: 'open',
    currentVolunteers: 0,
    createdAt: context.now
  };
}

// === 更新 ===

/**
 * 開始前のopen期間にコーディネーターだけが変更できる
 */
function requirePreStartCoordinator(
  event: CrisisEvent,
  context: CommandContext,
  action: string
): Result<CrisisEvent, CrisisError> {
  if (event.coordinator !== context.caller) {
    return unauthorizedFailure<CrisisEvent>(
      context.caller,
      `Only the coordinator can ${action} event ${event.eventId}`
    );
  }
  if (event.status !== 'open') {
    return unauthorizedFailure<CrisisEvent>(
      context.caller,
      `Event ${event.eventId} is ${event.status}; cannot ${action}`,
      { status: event.status }
    );
  }
  if (context.now >= event.startBlock) {
    return unauthorizedFailure<CrisisEvent>(
      context.caller,
      `Event ${event.eventId} has already started; cannot ${action}`,
      { now: context.now, startBlock: event.startBlock }
    );
  }
  return Ok(event);
}

// 空文字は「変更なし」
const textOrUnchanged = (next: string | undefined, current: string): string =>
  next ? next : current;

export function updateCrisisEvent(
  event: CrisisEvent,
  patch: EventPatch,
  context: CommandContext
): Result<CrisisEvent, CrisisError> {
  return resultPipe(requirePreStartCoordinator(event, context, 'update'))
    .map((current): CrisisEvent => ({
      ...current,
      title: textOrUnchanged(patch.title, current.title),
      description: textOrUnchanged(patch.description, current.description),
      location: textOrUnchanged(patch.location, current.location),
      endBlock: patch.endBlock ?? current.endBlock,
      maxVolunteers: patch.maxVolunteers ?? current.maxVolunteers,
      tags: patch.tags ? uniqueTags(patch.tags) : current.tags
    }))
    .value();
}

// === 状態遷移 ===

/**
 * closed / cancelled への遷移。終了時刻を現在の論理時刻で上書きする
 */
export function closeCrisisEvent(
  event: CrisisEvent,
  requestedStatus: string,
  context: CommandContext
): Result<CrisisEvent, CrisisError> {
  if (event.coordinator !== context.caller) {
    return unauthorizedFailure<CrisisEvent>(
      context.caller,
      `Only the coordinator can close event ${event.eventId}`
    );
  }

  const parsed = TerminalStatusSchema.safeParse(requestedStatus);
  if (!parsed.success) {
    return transitionFailure<CrisisEvent>(
      'INVALID_STATUS',
      event.status,
      `Status ${requestedStatus} is not a terminal status`,
      requestedStatus
    );
  }

  const status: TerminalStatus = parsed.data;
  if (status === event.status) {
    return transitionFailure<CrisisEvent>(
      'INVALID_STATUS',
      event.status,
      `Event ${event.eventId} is already ${status}`,
      status
    );
  }
  if (isTerminalStatus(event.status)) {
    return transitionFailure<CrisisEvent>(
      'INVALID_STATUS',
      event.status,
      `Event ${event.eventId} is ${event.status} and cannot change status`,
      status
    );
  }

  const closed: CrisisEvent = {
    ...event,
    status,
    endBlock: context.now
  };
  return Ok(closed);
}

/**
 * open → active。開始ブロック到達後にコーディネーターが明示的に呼ぶ
 */
export function activateCrisisEvent(
  event: CrisisEvent,
  context: CommandContext
): Result<CrisisEvent, CrisisError> {
  if (event.coordinator !== context.caller) {
    return unauthorizedFailure<CrisisEvent>(
      context.caller,
      `Only the coordinator can activate event ${event.eventId}`
    );
  }
  if (event.status !== 'open') {
    return unauthorizedFailure<CrisisEvent>(
      context.caller,
      `Event ${event.eventId} is ${event.status}; cannot activate`,
      { status: event.status }
    );
  }
  if (context.now < event.startBlock) {
    return unauthorizedFailure<CrisisEvent>(
      context.caller,
      `Event ${event.eventId} starts at block ${event.startBlock}`,
      { now: context.now, startBlock: event.startBlock }
    );
  }
  const activated: CrisisEvent = { ...event, status: 'active' };
  return Ok(activated);
}
