/**
 * 配置验证模块
 *
 * 功能：
 * - 验证 NepseAPI 地址与超时配置
 * - 验证交易时段覆盖与休市日期
 * - 验证门禁模式
 */
import { createConfig, parseGateMode, PROBE_TIMEOUT_RANGE, REQUEST_TIMEOUT_RANGE } from './config.index.js';
import {
  getStringConfig,
  parseBoundedNumberConfig,
  parseClosedDatesConfig,
  parseSessionWindows,
} from './utils.js';
import type { Logger } from '../utils/logger/types.js';
import type { CollectorConfig } from '../types/config.js';
import type { ConfigValidationError, FieldError, ValidationResult } from './types.js';

/**
 * 创建配置验证错误
 * @param message 错误消息
 * @param missingFields 出错的字段列表
 * @returns ConfigValidationError 错误对象
 */
export const createConfigValidationError = (
  message: string,
  missingFields: ReadonlyArray<string> = [],
): ConfigValidationError => {
  return Object.assign(new Error(message), {
    name: 'ConfigValidationError' as const,
    missingFields,
  });
};

/**
 * 类型保护：检查是否为配置验证错误。
 */
export function isConfigValidationError(err: unknown): err is ConfigValidationError {
  return err instanceof Error && err.name === 'ConfigValidationError';
}

function validateBaseUrl(env: NodeJS.ProcessEnv): FieldError | null {
  const value = getStringConfig(env, 'NEPSE_API_BASE_URL');
  if (value === null) {
    return null;
  }
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return { field: 'NEPSE_API_BASE_URL', message: `NEPSE_API_BASE_URL 不是有效 URL: ${value}` };
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return { field: 'NEPSE_API_BASE_URL', message: `NEPSE_API_BASE_URL 仅支持 http/https: ${value}` };
  }
  return null;
}

/**
 * 验证环境变量中的采集配置
 * @returns 验证结果（含全部错误）
 */
export function validateConfigEnv(env: NodeJS.ProcessEnv): ValidationResult {
  const errors: FieldError[] = [];

  const baseUrlError = validateBaseUrl(env);
  if (baseUrlError) {
    errors.push(baseUrlError);
  }

  const timeouts = [
    { envKey: 'REQUEST_TIMEOUT_MS', range: REQUEST_TIMEOUT_RANGE },
    { envKey: 'PROBE_TIMEOUT_MS', range: PROBE_TIMEOUT_RANGE },
  ] as const;
  for (const { envKey, range } of timeouts) {
    const value = parseBoundedNumberConfig({ env, envKey, defaultValue: range.min, ...range });
    if (value === null) {
      errors.push({
        field: envKey,
        message: `${envKey} 须为 ${range.min}-${range.max} 之间的数字`,
      });
    }
  }

  const sessionWindowsText = getStringConfig(env, 'SESSION_WINDOWS');
  if (sessionWindowsText !== null) {
    const parsed = parseSessionWindows(sessionWindowsText);
    if (!parsed.ok) {
      errors.push({ field: 'SESSION_WINDOWS', message: `SESSION_WINDOWS 无效: ${parsed.error}` });
    }
  }

  if (parseClosedDatesConfig(env, 'MARKET_CLOSED_DATES') === null) {
    errors.push({
      field: 'MARKET_CLOSED_DATES',
      message: 'MARKET_CLOSED_DATES 须为逗号分隔的 YYYY-MM-DD 日期',
    });
  }

  if (parseGateMode(env) === null) {
    errors.push({
      field: 'COLLECTION_GATE_MODE',
      message: 'COLLECTION_GATE_MODE 仅支持 strict 或 skip',
    });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * 验证全部配置并返回采集配置
 * @throws ConfigValidationError 任一配置无效时抛出
 */
export function validateAllConfig({
  env,
  logger,
}: {
  readonly env: NodeJS.ProcessEnv;
  readonly logger: Logger;
}): CollectorConfig {
  const result = validateConfigEnv(env);
  if (!result.valid) {
    for (const error of result.errors) {
      logger.error(`[配置错误] ${error.message}`);
    }
    throw createConfigValidationError(
      `配置验证失败，共 ${result.errors.length} 处`,
      result.errors.map((error) => error.field),
    );
  }
  return createConfig({ env });
}
