/**
 * 設定管理モジュール
 */

export {
  type EngineConfig,
  type LimitsConfig,
  type LoggingConfig,
  type ObservabilityConfig,
  type ConfigOverrides,
  type Environment,
  type LogLevel,
  EngineConfigSchema,
  LimitsConfigSchema,
  LoggingConfigSchema,
  ObservabilityConfigSchema,
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './engine-config';

export {
  DEFAULT_ENGINE_CONFIG,
  MINIMAL_CONFIG
} from './default-config';

export {
  ConfigLoader,
  loadConfig,
  getCurrentConfig,
  reloadConfig,
  setConfigForTesting
} from './config-loader';
