/**
 * 交易日历模块
 *
 * 功能：
 * - 判断给定时刻 NEPSE 是否处于交易时段（isMarketOpen）
 * - 生成当前适用时段的诊断描述（describeSchedule）
 * - 计算下一交易时段开盘时刻（getNextSessionOpen）
 *
 * 规则：
 * - 所有比较均基于尼泊尔时间（UTC+5:45），触发器运行在 UTC，需每次换算
 * - 时段区间为 [开盘, 收盘)：开盘时刻计入，收盘时刻不计入
 * - 星期无对应时段或日期为休市日时，全天休市
 *
 * isMarketOpen 与 describeSchedule 共用 resolveSession，避免日志描述与门禁判定不一致。
 */
import { NEXT_SESSION_SCAN_DAYS, TIME, WEEKDAY_LABELS } from '../../constants/index.js';
import {
  formatMinuteOfDay,
  getNepalClock,
  getNepalDayStartUtcMs,
  toNepalTimeOfDay,
} from '../../utils/time/index.js';
import { findSessionWindow, formatResolution } from './utils.js';
import type {
  SessionCalendar,
  SessionCalendarConfig,
  SessionResolution,
  SessionStatus,
} from '../../types/session.js';

/**
 * 创建交易日历。
 *
 * @param config 时段窗口与休市日期
 * @returns SessionCalendar 接口，全部方法为纯函数
 */
export function createSessionCalendar(config: SessionCalendarConfig): SessionCalendar {
  const { windows, closedDates } = config;

  function resolveSession(date: Date): SessionResolution {
    const clock = getNepalClock(date);
    const window = findSessionWindow(windows, clock.weekday);
    const localTime = toNepalTimeOfDay(date);

    let status: SessionStatus;
    // 无效时间按无交易时段处理
    if (!window || Number.isNaN(date.getTime())) {
      status = 'noSession';
    } else if (closedDates.has(clock.dateKey)) {
      status = 'closedDate';
    } else if (clock.msOfDay < window.openMinute * TIME.MILLISECONDS_PER_MINUTE) {
      status = 'beforeOpen';
    } else if (clock.msOfDay >= window.closeMinute * TIME.MILLISECONDS_PER_MINUTE) {
      status = 'afterClose';
    } else {
      status = 'open';
    }

    return {
      dateKey: clock.dateKey,
      weekday: clock.weekday,
      localTime,
      window,
      status,
      isOpen: status === 'open',
    };
  }

  function isMarketOpen(date: Date): boolean {
    return resolveSession(date).isOpen;
  }

  function getNextSessionOpen(date: Date): Date | null {
    const nowMs = date.getTime();
    if (Number.isNaN(nowMs)) {
      return null;
    }
    const todayStartUtcMs = getNepalDayStartUtcMs(date);

    for (let offset = 0; offset <= NEXT_SESSION_SCAN_DAYS; offset += 1) {
      const dayStartUtcMs = todayStartUtcMs + offset * TIME.MILLISECONDS_PER_DAY;
      const clock = getNepalClock(new Date(dayStartUtcMs));
      const window = findSessionWindow(windows, clock.weekday);
      if (!window || closedDates.has(clock.dateKey)) {
        continue;
      }
      const openUtcMs = dayStartUtcMs + window.openMinute * TIME.MILLISECONDS_PER_MINUTE;
      if (openUtcMs >= nowMs) {
        return new Date(openUtcMs);
      }
    }
    return null;
  }

  function describeSchedule(date: Date): string {
    const resolution = resolveSession(date);
    const description = formatResolution(resolution);
    if (resolution.isOpen) {
      return description;
    }

    const nextOpen = getNextSessionOpen(date);
    if (!nextOpen) {
      return `${description}；${NEXT_SESSION_SCAN_DAYS} 天内无交易时段`;
    }
    const nextClock = getNepalClock(nextOpen);
    const nextOpenTime = formatMinuteOfDay(nextClock.hour * 60 + nextClock.minute);
    return `${description}；下一交易时段 ${nextClock.dateKey} ${WEEKDAY_LABELS[nextClock.weekday]} ${nextOpenTime}`;
  }

  return {
    isMarketOpen,
    resolveSession,
    describeSchedule,
    getNextSessionOpen,
  };
}
