import { WEEKDAY_LABELS } from '../../constants/index.js';
import { formatMinuteOfDay } from '../../utils/time/index.js';
import type { SessionResolution, SessionWindow, Weekday } from '../../types/session.js';

/**
 * 查找适用于指定星期的交易时段，无时段返回 null。
 */
export function findSessionWindow(
  windows: ReadonlyArray<SessionWindow>,
  weekday: Weekday,
): SessionWindow | null {
  return windows.find((window) => window.weekdays.includes(weekday)) ?? null;
}

/**
 * 时段区间文本，如「标准时段 11:00-15:00」。
 */
function formatSessionWindow(window: SessionWindow): string {
  return `${window.label} ${formatMinuteOfDay(window.openMinute)}-${formatMinuteOfDay(window.closeMinute)}`;
}

/**
 * 根据解析结果生成时段描述（不含下一交易时段）。
 */
export function formatResolution(resolution: SessionResolution): string {
  const { weekday, dateKey, localTime, window, status } = resolution;
  const weekdayLabel = WEEKDAY_LABELS[weekday];
  const now = `当前 NPT ${localTime}`;

  if (status === 'noSession' || !window) {
    return `${weekdayLabel} 无交易时段，${now}，休市`;
  }
  if (status === 'closedDate') {
    return `${weekdayLabel} ${dateKey} 为休市日，${now}，休市`;
  }

  const statusText = status === 'open' ? '开市中' : status === 'beforeOpen' ? '未开盘' : '已收盘';
  return `${weekdayLabel} ${formatSessionWindow(window)}，${now}，${statusText}`;
}
