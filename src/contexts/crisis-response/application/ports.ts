import type { EngineConfig } from '../../../shared/config/index';
import type { LogicalClock } from '../../../shared/clock/index';
import type { Logger } from '../../../shared/logging/logger';
import type { ICrisisStateStore } from '../infrastructure/state/interfaces';

/**
 * エンジンが外部から受け取る依存
 */
export interface CrisisEngineDependencies {
  /** 単調非減少の論理クロック */
  clock: LogicalClock;
  store: ICrisisStateStore;
  logger?: Logger;
  /** 省略時は getCurrentConfig() */
  config?: EngineConfig;
}
