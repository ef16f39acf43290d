/**
 * 采集程序配置模块
 *
 * 功能：
 * - 从环境变量读取采集配置（.env.local 由入口通过 dotenv 加载）
 * - 缺省或非法值回退到默认值，非法值由 config.validator.ts 统一报错
 *
 * 环境变量：
 * - NEPSE_API_BASE_URL：NepseAPI 服务地址（默认 http://localhost:8000）
 * - REQUEST_TIMEOUT_MS / PROBE_TIMEOUT_MS：请求超时与可达性探测超时
 * - DATA_DIR / LOG_DIR：数据产物目录与日志目录
 * - SESSION_WINDOWS：交易时段覆盖（如 `SUN-THU 11:00-15:00; FRI 11:00-13:00`）
 * - MARKET_CLOSED_DATES：休市日期（逗号分隔 YYYY-MM-DD）
 * - RUN_LABEL：运行标识（默认取 GITHUB_RUN_NUMBER，否则为 local）
 * - COLLECTION_GATE_MODE：strict（默认）或 skip
 * - DEBUG：true 时输出调试日志
 */
import { COLLECTION, DEFAULT_SESSION_WINDOWS, NEPSE_API } from '../constants/index.js';
import {
  getBooleanConfig,
  getStringConfig,
  parseBoundedNumberConfig,
  parseClosedDatesConfig,
  parseSessionWindows,
} from './utils.js';
import type { CollectorConfig, GateMode } from '../types/config.js';

/** 请求超时范围（毫秒） */
export const REQUEST_TIMEOUT_RANGE = { min: 1000, max: 120_000 } as const;

/** 探测超时范围（毫秒） */
export const PROBE_TIMEOUT_RANGE = { min: 1000, max: 60_000 } as const;

/**
 * 解析门禁模式，未设置返回 strict，非法返回 null。
 */
export function parseGateMode(env: NodeJS.ProcessEnv): GateMode | null {
  const value = getStringConfig(env, 'COLLECTION_GATE_MODE');
  if (value === null) {
    return 'strict';
  }
  const normalized = value.toLowerCase();
  if (normalized === 'strict' || normalized === 'skip') {
    return normalized;
  }
  return null;
}

/**
 * 从环境变量创建采集配置。
 * 本函数不抛错；启动时由 validateAllConfig 校验同一份环境变量。
 */
export function createConfig({ env }: { readonly env: NodeJS.ProcessEnv }): CollectorConfig {
  const sessionWindowsText = getStringConfig(env, 'SESSION_WINDOWS');
  const parsedWindows = sessionWindowsText === null ? null : parseSessionWindows(sessionWindowsText);

  return {
    apiBaseUrl: (getStringConfig(env, 'NEPSE_API_BASE_URL') ?? NEPSE_API.DEFAULT_BASE_URL).replace(/\/+$/, ''),
    requestTimeoutMs:
      parseBoundedNumberConfig({
        env,
        envKey: 'REQUEST_TIMEOUT_MS',
        defaultValue: NEPSE_API.DEFAULT_REQUEST_TIMEOUT_MS,
        ...REQUEST_TIMEOUT_RANGE,
      }) ?? NEPSE_API.DEFAULT_REQUEST_TIMEOUT_MS,
    probeTimeoutMs:
      parseBoundedNumberConfig({
        env,
        envKey: 'PROBE_TIMEOUT_MS',
        defaultValue: NEPSE_API.DEFAULT_PROBE_TIMEOUT_MS,
        ...PROBE_TIMEOUT_RANGE,
      }) ?? NEPSE_API.DEFAULT_PROBE_TIMEOUT_MS,
    dataDir: getStringConfig(env, 'DATA_DIR') ?? 'data',
    logDir: getStringConfig(env, 'LOG_DIR') ?? 'logs',
    calendar: {
      windows: parsedWindows?.ok ? parsedWindows.windows : DEFAULT_SESSION_WINDOWS,
      closedDates: parseClosedDatesConfig(env, 'MARKET_CLOSED_DATES') ?? new Set<string>(),
    },
    runLabel:
      getStringConfig(env, 'RUN_LABEL') ??
      getStringConfig(env, 'GITHUB_RUN_NUMBER') ??
      COLLECTION.DEFAULT_RUN_LABEL,
    gateMode: parseGateMode(env) ?? 'strict',
    debug: getBooleanConfig(env, 'DEBUG', false),
  };
}
