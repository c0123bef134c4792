import { EventIdSchema } from '../../src/shared/types/index';
import { DEFAULT_ENGINE_CONFIG } from '../../src/shared/config/index';
import type { CommandContext } from '../../src/contexts/crisis-response/domain/aggregates/command-context';
import {
  validateCreateParams,
  openCrisisEvent
} from '../../src/contexts/crisis-response/domain/aggregates/crisis-event-aggregate';
import type {
  CrisisEvent,
  CreateEventParams
} from '../../src/contexts/crisis-response/domain/entities/crisis-event-types';
import { floodResponse, accounts, START_BLOCK } from './fixtures';

export const coordinatorAt = (now: number): CommandContext => ({
  caller: accounts.coordinator,
  now
});

/**
 * ブロック1000で作成したopen状態のイベント（ID 1）
 */
export function openEvent(
  overrides: Partial<CreateEventParams> = {},
  state: Partial<Pick<CrisisEvent, 'status' | 'currentVolunteers'>> = {}
): CrisisEvent {
  const validated = validateCreateParams(floodResponse(overrides), START_BLOCK, DEFAULT_ENGINE_CONFIG.limits);
  if (!validated.success) {
    throw new Error(`fixture is invalid: ${validated.error.message}`);
  }
  return {
    ...openCrisisEvent(EventIdSchema.parse(1), validated.data, coordinatorAt(START_BLOCK)),
    ...state
  };
}
