import type { Weekday } from '../../types/session.js';

/**
 * 尼泊尔时间结构。
 * 类型用途：表示从 UTC 时间转换后的尼泊尔本地日历分量，作为时间工具函数返回值。
 * 数据来源：由 getNepalClock 基于 Date 计算生成。
 * 使用范围：时间工具、交易日历、日志格式化。
 */
export type NepalClock = {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly weekday: Weekday;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
  readonly msOfDay: number;
  readonly dateKey: string;
};
