import type { z } from 'zod';
import type { ConfigOverrides, EngineConfig } from './engine-config';
import {
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './engine-config';
import { DEFAULT_ENGINE_CONFIG } from './default-config';
import { createLogger } from '../logging/logger';

/**
 * 設定読み込み・管理クラス
 *
 * 優先順位（後勝ち）:
 * 1. デフォルト設定
 * 2. 環境別プリセット
 * 3. 環境変数
 * 4. オーバーライド設定
 */

const ENV_PREFIX = 'CRISIS_';

type PlainObject = Record<string, unknown>;

type LoadResult = {
  success: true;
  config: EngineConfig;
} | {
  success: false;
  error: z.ZodError;
  partialConfig?: PlainObject;
};

const LIMIT_ENV_KEYS: ReadonlyArray<readonly [string, keyof EngineConfig['limits']]> = [
  ['MAX_TITLE_LENGTH', 'maxTitleLength'],
  ['MAX_DESCRIPTION_LENGTH', 'maxDescriptionLength'],
  ['MAX_LOCATION_LENGTH', 'maxLocationLength'],
  ['MAX_REQUIRED_SKILLS', 'maxRequiredSkills'],
  ['MAX_TAGS', 'maxTags']
];

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * 環境変数から設定を読み込む
 *
 * 数値でない値はそのままNaNとして渡し、検証で失敗させる
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): PlainObject {
  const config: PlainObject = {};

  const environment = env[`${ENV_PREFIX}ENVIRONMENT`];
  if (environment) {
    config.environment = environment;
  }

  const limits: PlainObject = {};
  for (const [suffix, key] of LIMIT_ENV_KEYS) {
    const raw = env[`${ENV_PREFIX}${suffix}`];
    if (raw !== undefined && raw !== '') {
      limits[key] = Number(raw);
    }
  }
  if (Object.keys(limits).length > 0) {
    config.limits = limits;
  }

  const logging: PlainObject = {};
  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level) {
    logging.level = level;
  }
  const auditLog = env[`${ENV_PREFIX}AUDIT_LOG_ENABLED`];
  if (auditLog) {
    logging.enableAuditLog = auditLog === 'true';
  }
  if (Object.keys(logging).length > 0) {
    config.observability = { logging };
  }

  return config;
}

function getEnvironmentPreset(environment: unknown): ConfigOverrides {
  switch (environment) {
    case 'development':
      return DEVELOPMENT_CONFIG;
    case 'test':
      return TEST_CONFIG;
    case 'production':
      return PRODUCTION_CONFIG;
    default:
      return {};
  }
}

/**
 * 深いマージ（入れ子のオブジェクトをマージ、配列は置き換え）
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private cachedConfig: EngineConfig | null = null;

  private constructor() {}

  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 設定を読み込み・検証
   */
  load(overrides?: ConfigOverrides, env: NodeJS.ProcessEnv = process.env): LoadResult {
    const envConfig = loadFromEnvironment(env);
    const environment = overrides?.environment
      ?? envConfig.environment
      ?? DEFAULT_ENGINE_CONFIG.environment;

    let config = deepMerge(DEFAULT_ENGINE_CONFIG, getEnvironmentPreset(environment));
    config = deepMerge(config, envConfig);
    if (overrides) {
      config = deepMerge(config, overrides);
    }

    const validationResult = validateConfig(config);
    if (!validationResult.success) {
      return {
        success: false,
        error: validationResult.error,
        partialConfig: config
      };
    }

    this.cachedConfig = validationResult.data;
    return {
      success: true,
      config: validationResult.data
    };
  }

  getCached(): EngineConfig | null {
    return this.cachedConfig;
  }

  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * 検証済みの設定を直接キャッシュに置く（テスト用）
   */
  override(config: EngineConfig): void {
    this.cachedConfig = config;
  }

  reload(overrides?: ConfigOverrides, env?: NodeJS.ProcessEnv): LoadResult {
    this.clearCache();
    return this.load(overrides, env);
  }
}

const configLoader = ConfigLoader.getInstance();

export function loadConfig(overrides?: ConfigOverrides, env?: NodeJS.ProcessEnv): LoadResult {
  return configLoader.load(overrides, env);
}

/**
 * 現在の設定を取得する。読み込みに失敗した場合はデフォルト設定
 */
export function getCurrentConfig(): EngineConfig {
  const cached = configLoader.getCached();
  if (cached) {
    return cached;
  }

  const result = configLoader.load();
  if (result.success) {
    return result.config;
  }

  createLogger({ level: 'warn', name: 'config' }).warn(
    { issues: result.error.issues },
    'Failed to load configuration, using defaults'
  );
  return DEFAULT_ENGINE_CONFIG;
}

export function reloadConfig(overrides?: ConfigOverrides, env?: NodeJS.ProcessEnv): LoadResult {
  return configLoader.reload(overrides, env);
}

/**
 * テスト用: 設定を強制的にセット
 */
export function setConfigForTesting(config: EngineConfig): void {
  configLoader.override(config);
}
