import type { EngineConfig } from './engine-config';

/**
 * デフォルト設定値
 *
 * 環境変数が不完全でも動作する
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  environment: 'development',

  limits: {
    maxTitleLength: 100,
    maxDescriptionLength: 500,
    maxLocationLength: 100,
    maxRequiredSkills: 10,
    maxTags: 10
  },

  observability: {
    logging: {
      level: 'info',
      enableAuditLog: true
    }
  }
};

/**
 * 最小限の設定（テスト用）
 */
export const MINIMAL_CONFIG: EngineConfig = {
  environment: 'test',

  limits: {
    maxTitleLength: 20,
    maxDescriptionLength: 50,
    maxLocationLength: 20,
    maxRequiredSkills: 3,
    maxTags: 3
  },

  observability: {
    logging: {
      level: 'silent',
      enableAuditLog: false
    }
  }
};
