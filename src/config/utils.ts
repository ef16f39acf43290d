import {
  DATE_KEY_PATTERN,
  SESSION_TIME_PATTERN,
  WEEKDAY_CODES,
  WEEKDAY_LABELS,
} from '../constants/index.js';
import type { SessionWindow, Weekday } from '../types/session.js';
import type { BoundedNumberConfig, SessionWindowsParseResult } from './types.js';

const WEEKDAYS: ReadonlyArray<Weekday> = [0, 1, 2, 3, 4, 5, 6];

/**
 * 读取字符串配置，未设置、空串或占位符（形如 your_xxx_here）时返回 null。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @returns 去除首尾空白后的字符串，或 null
 */
export function getStringConfig(env: NodeJS.ProcessEnv, envKey: string): string | null {
  const value = env[envKey];
  if (!value || value.trim() === '' || value === `your_${envKey.toLowerCase()}_here`) {
    return null;
  }
  return value.trim();
}

/**
 * 读取布尔配置，仅识别 'true'/'false'，其他值返回默认值。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @param defaultValue - 未设置或无法识别时的默认值，默认为 false
 * @returns 解析后的布尔值
 */
export function getBooleanConfig(
  env: NodeJS.ProcessEnv,
  envKey: string,
  defaultValue: boolean = false,
): boolean {
  const value = env[envKey];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalizedValue = value.trim().toLowerCase();
  if (normalizedValue === 'true') {
    return true;
  }
  if (normalizedValue === 'false') {
    return false;
  }
  return defaultValue;
}

/**
 * 读取带上下限的数值配置。
 * 未设置时返回默认值；非法或越界返回 null（由 validator 报错）。
 */
export function parseBoundedNumberConfig({
  env,
  envKey,
  defaultValue,
  min,
  max,
}: BoundedNumberConfig): number | null {
  const value = getStringConfig(env, envKey);
  if (value === null) {
    return defaultValue;
  }
  const num = Number(value);
  if (!Number.isFinite(num) || num < min || num > max) {
    return null;
  }
  return num;
}

/**
 * 解析 HH:mm 为当日分钟数，非法返回 null。
 */
function parseSessionTime(text: string): number | null {
  const match = SESSION_TIME_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return null;
  }
  return hour * 60 + minute;
}

function parseWeekdayCode(code: string): Weekday | null {
  const index = WEEKDAY_CODES.findIndex((item) => item === code.trim().toUpperCase());
  return WEEKDAYS[index] ?? null;
}

/**
 * 解析星期表达式：逗号分隔，支持区间（向后循环，如 THU-SUN）。
 * @returns 去重后的星期列表，非法返回 null
 */
export function parseWeekdays(text: string): Weekday[] | null {
  const result: Weekday[] = [];
  for (const token of text.split(',')) {
    const [startText, endText, ...rest] = token.split('-');
    if (startText === undefined || rest.length > 0) {
      return null;
    }
    const start = parseWeekdayCode(startText);
    const end = endText === undefined ? start : parseWeekdayCode(endText);
    if (start === null || end === null) {
      return null;
    }
    let day = start;
    while (true) {
      if (!result.includes(day)) {
        result.push(day);
      }
      if (day === end) {
        break;
      }
      day = WEEKDAYS[(day + 1) % 7] ?? start;
    }
  }
  return result;
}

/**
 * 解析交易时段覆盖配置。
 * 格式：以 ; 分隔的条目，每条为「星期表达式 HH:mm-HH:mm」，
 * 例如 `SUN-THU 11:00-15:00; FRI 11:00-13:00`。
 *
 * @param text 配置原文
 * @returns 解析结果，失败时包含错误描述
 */
export function parseSessionWindows(text: string): SessionWindowsParseResult {
  const entries = text
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  if (entries.length === 0) {
    return { ok: false, error: '未包含任何时段' };
  }

  const windows: SessionWindow[] = [];
  for (const entry of entries) {
    const match = /^(\S+)\s+(\S+?)\s*-\s*(\S+)$/.exec(entry);
    if (!match) {
      return { ok: false, error: `时段格式无效: ${entry}` };
    }
    const [, daysText = '', openText = '', closeText = ''] = match;
    const weekdays = parseWeekdays(daysText);
    if (!weekdays) {
      return { ok: false, error: `星期无效: ${daysText}` };
    }
    const openMinute = parseSessionTime(openText);
    const closeMinute = parseSessionTime(closeText);
    if (openMinute === null || closeMinute === null) {
      return { ok: false, error: `时间无效: ${entry}` };
    }
    windows.push({
      label: `自定义时段(${daysText.toUpperCase()})`,
      weekdays,
      openMinute,
      closeMinute,
    });
  }

  const errors = validateSessionWindows(windows);
  if (errors.length > 0) {
    return { ok: false, error: errors.join('；') };
  }
  return { ok: true, windows };
}

/**
 * 校验时段窗口：开盘须早于收盘，同一星期不得出现在多个时段中。
 * @returns 错误消息列表，空数组表示通过
 */
function validateSessionWindows(windows: ReadonlyArray<SessionWindow>): string[] {
  const errors: string[] = [];
  const owners = new Map<Weekday, string>();
  for (const window of windows) {
    if (window.openMinute >= window.closeMinute) {
      errors.push(`${window.label} 开盘时间须早于收盘时间`);
    }
    for (const weekday of window.weekdays) {
      const owner = owners.get(weekday);
      if (owner !== undefined) {
        errors.push(`${WEEKDAY_LABELS[weekday]} 同时属于 ${owner} 与 ${window.label}`);
      } else {
        owners.set(weekday, window.label);
      }
    }
  }
  return errors;
}

/**
 * 解析休市日期列表（逗号或空白分隔的 YYYY-MM-DD）。
 * 未设置返回空集合；任一日期非法返回 null（由 validator 报错）。
 */
export function parseClosedDatesConfig(env: NodeJS.ProcessEnv, envKey: string): Set<string> | null {
  const value = getStringConfig(env, envKey);
  const dates = new Set<string>();
  if (value === null) {
    return dates;
  }
  for (const token of value.split(/[\s,]+/)) {
    if (token === '') {
      continue;
    }
    const match = DATE_KEY_PATTERN.exec(token);
    if (!match) {
      return null;
    }
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
      return null;
    }
    dates.add(token);
  }
  return dates;
}
