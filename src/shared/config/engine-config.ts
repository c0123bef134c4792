import { z } from 'zod';

/**
 * 危機対応エンジン設定定義
 *
 * - Zodによる実行時検証
 * - 環境別プリセット
 */

// === サイズ制限設定 ===
export const LimitsConfigSchema = z.object({
  /** タイトルの最大文字数 */
  maxTitleLength: z.number().int().min(1).max(10000).default(100),

  /** 説明文の最大文字数 */
  maxDescriptionLength: z.number().int().min(1).max(10000).default(500),

  /** 開催場所の最大文字数 */
  maxLocationLength: z.number().int().min(1).max(10000).default(100),

  /** 必要スキル数の上限 */
  maxRequiredSkills: z.number().int().min(1).max(100).default(10),

  /** タグ数の上限 */
  maxTags: z.number().int().min(1).max(100).default(10)
});

// === ログ設定 ===
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  /** 確定した変更操作をinfoレベルで監査ログとして出力する */
  enableAuditLog: z.boolean().default(true)
});

export const ObservabilityConfigSchema = z.object({
  logging: LoggingConfigSchema.default({})
});

// === 統合設定スキーマ ===
export const EngineConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  limits: LimitsConfigSchema.default({}),
  observability: ObservabilityConfigSchema.default({})
});

// === 型定義 ===
export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type Environment = EngineConfig['environment'];
export type LogLevel = LoggingConfig['level'];

/** 部分的な上書き設定 */
export type ConfigOverrides = {
  environment?: Environment;
  limits?: Partial<LimitsConfig>;
  observability?: {
    logging?: Partial<LoggingConfig>;
  };
};

// === 設定検証ヘルパー ===
export function validateConfig(input: unknown): {
  success: true;
  data: EngineConfig;
} | {
  success: false;
  error: z.ZodError;
} {
  const result = EngineConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  } else {
    return { success: false, error: result.error };
  }
}

// === 環境別設定プリセット ===
export const DEVELOPMENT_CONFIG: ConfigOverrides = {
  environment: 'development',
  observability: {
    logging: {
      level: 'debug',
      enableAuditLog: true
    }
  }
};

export const TEST_CONFIG: ConfigOverrides = {
  environment: 'test',
  observability: {
    logging: {
      level: 'silent',
      enableAuditLog: false
    }
  }
};

export const PRODUCTION_CONFIG: ConfigOverrides = {
  environment: 'production',
  observability: {
    logging: {
      level: 'info',
      enableAuditLog: true
    }
  }
};
