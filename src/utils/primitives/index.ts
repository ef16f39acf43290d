import { getNepalClock, toNepalTimeOfDay } from '../time/index.js';

/**
 * 类型保护：判断 unknown 是否为可索引对象。
 * 默认行为：仅当 typeof value === 'object' 且 value !== null 时返回 true，否则返回 false。
 *
 * @param value 待判断值
 * @returns true 表示可按键读取字段，否则返回 false
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * 类型保护：判断是否为非数组的普通对象记录。
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && !Array.isArray(value);
}

/**
 * 将时间转换为尼泊尔时间（UTC+5:45）的日志格式字符串。
 * 默认行为：date 为 null 时使用当前时间。
 *
 * @param date 时间对象，默认 null（当前时间）
 * @returns 尼泊尔时间字符串 YYYY-MM-DD HH:mm:ss.sss
 */
export function toNepalTimeLog(date: Date | null = null): string {
  const targetDate = date ?? new Date();
  const clock = getNepalClock(targetDate);
  const milliseconds = String(clock.millisecond).padStart(3, '0');
  return `${clock.dateKey} ${toNepalTimeOfDay(targetDate)}.${milliseconds}`;
}
