import { describe, test, expect, afterEach } from 'vitest';
import {
  ConfigLoader,
  loadConfig,
  getCurrentConfig,
  setConfigForTesting,
  MINIMAL_CONFIG,
  DEFAULT_ENGINE_CONFIG
} from '../../src/shared/config/index';

describe('設定ローダー', () => {
  afterEach(() => {
    ConfigLoader.getInstance().clearCache();
  });

  test('環境変数が無ければデフォルトに開発用プリセットを重ねる', () => {
    const result = loadConfig(undefined, {});

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.config.environment).toBe('development');
      expect(result.config.limits).toEqual(DEFAULT_ENGINE_CONFIG.limits);
      expect(result.config.observability.logging).toEqual({ level: 'debug', enableAuditLog: true });
    }
  });

  test('環境名でテスト用プリセットを選ぶ', () => {
    const result = loadConfig(undefined, { CRISIS_ENVIRONMENT: 'test' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.config.observability.logging).toEqual({ level: 'silent', enableAuditLog: false });
    }
  });

  test('環境変数はプリセットより優先される', () => {
    const result = loadConfig(undefined, {
      CRISIS_ENVIRONMENT: 'test',
      CRISIS_LOG_LEVEL: 'warn',
      CRISIS_MAX_TAGS: '5'
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.config.observability.logging.level).toBe('warn');
      expect(result.config.limits.maxTags).toBe(5);
    }
  });

  test('オーバーライドは環境変数より優先される', () => {
    const result = loadConfig({ limits: { maxTags: 7 } }, { CRISIS_MAX_TAGS: '5' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.config.limits.maxTags).toBe(7);
      expect(result.config.limits.maxRequiredSkills).toBe(10);
    }
  });

  test('数値でない制限値は検証エラー', () => {
    const result = loadConfig(undefined, { CRISIS_MAX_TAGS: 'many' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['limits', 'maxTags']);
    }
  });

  test('未知の環境名は検証エラー', () => {
    const result = loadConfig(undefined, { CRISIS_ENVIRONMENT: 'qa' });

    expect(result.success).toBe(false);
  });

  test('テスト用に設定を固定できる', () => {
    setConfigForTesting(MINIMAL_CONFIG);

    expect(getCurrentConfig()).toBe(MINIMAL_CONFIG);
  });
});
