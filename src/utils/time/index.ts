import { TIME } from '../../constants/index.js';
import type { Weekday } from '../../types/session.js';
import type { NepalClock } from './types.js';

const WEEKDAYS: ReadonlyArray<Weekday> = [0, 1, 2, 3, 4, 5, 6];

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * 将时间转换为尼泊尔时区（UTC+5:45）的日历分量。
 * 所有交易时段比较均基于该结果，不使用 UTC 分量。
 *
 * @param date 时间对象（UTC 瞬时）
 * @returns 尼泊尔当地日期、星期、时分秒及当日已过毫秒数
 */
export function getNepalClock(date: Date): NepalClock {
  const local = new Date(date.getTime() + TIME.NEPAL_TIMEZONE_OFFSET_MS);
  const year = local.getUTCFullYear();
  const month = local.getUTCMonth() + 1;
  const day = local.getUTCDate();
  const hour = local.getUTCHours();
  const minute = local.getUTCMinutes();
  const second = local.getUTCSeconds();
  const millisecond = local.getUTCMilliseconds();
  return {
    year,
    month,
    day,
    weekday: WEEKDAYS[local.getUTCDay()] ?? 0,
    hour,
    minute,
    second,
    millisecond,
    msOfDay:
      ((hour * 60 + minute) * 60 + second) * TIME.MILLISECONDS_PER_SECOND + millisecond,
    dateKey: `${year}-${pad(month)}-${pad(day)}`,
  };
}

/**
 * 返回该时间所在尼泊尔日 00:00 对应的 UTC 毫秒时间戳。
 */
export function getNepalDayStartUtcMs(date: Date): number {
  const localMs = date.getTime() + TIME.NEPAL_TIMEZONE_OFFSET_MS;
  const localDayStart = Math.floor(localMs / TIME.MILLISECONDS_PER_DAY) * TIME.MILLISECONDS_PER_DAY;
  return localDayStart - TIME.NEPAL_TIMEZONE_OFFSET_MS;
}

/**
 * 尼泊尔时间 HH:mm:ss。
 */
export function toNepalTimeOfDay(date: Date): string {
  const clock = getNepalClock(date);
  return `${pad(clock.hour)}:${pad(clock.minute)}:${pad(clock.second)}`;
}

/**
 * 尼泊尔时间 YYYY-MM-DD HH:mm:ss。
 */
export function toNepalDateTime(date: Date): string {
  return `${getNepalClock(date).dateKey} ${toNepalTimeOfDay(date)}`;
}

/**
 * 尼泊尔时间的 ISO 8601 字符串（带 +05:45 偏移）。
 *
 * @param date 时间对象
 * @returns 如 2026-10-15T12:30:00.000+05:45
 */
export function toNepalIso(date: Date): string {
  const clock = getNepalClock(date);
  return `${clock.dateKey}T${toNepalTimeOfDay(date)}.${pad(clock.millisecond, 3)}+05:45`;
}

/**
 * 文件名时间戳 YYYYMMDD_HHmmss（尼泊尔时间）。
 */
export function toNepalFileStamp(date: Date): string {
  const clock = getNepalClock(date);
  return (
    `${clock.year}${pad(clock.month)}${pad(clock.day)}_` +
    `${pad(clock.hour)}${pad(clock.minute)}${pad(clock.second)}`
  );
}

/**
 * 分钟数格式化为 HH:mm。
 */
export function formatMinuteOfDay(minuteOfDay: number): string {
  return `${pad(Math.floor(minuteOfDay / 60))}:${pad(minuteOfDay % 60)}`;
}
