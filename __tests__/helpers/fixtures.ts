import { ManualClock } from '../../src/shared/clock/index';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../../src/shared/config/index';
import { createLogger } from '../../src/shared/logging/logger';
import { CrisisResponseEngine } from '../../src/contexts/crisis-response/application/crisis-response-engine';
import { InMemoryCrisisStateStore } from '../../src/contexts/crisis-response/infrastructure/state/in-memory-state-store';
import type { CreateEventParams } from '../../src/contexts/crisis-response/domain/entities/crisis-event-types';

export const accounts = {
  coordinator: 'coordinator',
  volunteer1: 'volunteer1',
  volunteer2: 'volunteer2',
  unauthorized: 'unauthorized'
} as const;

export const START_BLOCK = 1000;

export const silentLogger = createLogger({ level: 'silent' });

export const TEST_ENGINE_CONFIG: EngineConfig = {
  ...DEFAULT_ENGINE_CONFIG,
  environment: 'test',
  observability: {
    logging: { level: 'silent', enableAuditLog: false }
  }
};

export function floodResponse(overrides: Partial<CreateEventParams> = {}): CreateEventParams {
  return {
    title: 'Flood Response',
    description: 'Help with flood relief',
    location: 'Riverside',
    startBlock: 1010,
    endBlock: 1100,
    requiredSkills: ['medical', 'logistics'],
    maxVolunteers: 50,
    tags: ['disaster', 'flood'],
    ...overrides
  };
}

export function createTestEngine(initialBlock: number = START_BLOCK) {
  const clock = new ManualClock(initialBlock);
  const store = new InMemoryCrisisStateStore();
  const engine = new CrisisResponseEngine({
    clock,
    store,
    logger: silentLogger,
    config: TEST_ENGINE_CONFIG
  });
  return { clock, store, engine };
}
