/**
 * 星期（0 = 周日 … 6 = 周六），与 Date#getUTCDay 一致。
 */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/**
 * 交易时段窗口。
 * 类型用途：描述某几个星期适用的开盘/收盘时间（当地时间，自零点起的分钟数），区间为 [open, close)。
 * 数据来源：默认值 DEFAULT_SESSION_WINDOWS，或由 SESSION_WINDOWS 环境变量解析。
 * 使用范围：交易日历、配置模块。
 */
export type SessionWindow = {
  readonly label: string;
  readonly weekdays: ReadonlyArray<Weekday>;
  readonly openMinute: number;
  readonly closeMinute: number;
};

/**
 * 交易日历配置。
 * 类型用途：createSessionCalendar 的入参，包含时段窗口与休市日期（YYYY-MM-DD，尼泊尔时间）。
 * 数据来源：配置模块。
 * 使用范围：交易日历、配置模块。
 */
export type SessionCalendarConfig = {
  readonly windows: ReadonlyArray<SessionWindow>;
  readonly closedDates: ReadonlySet<string>;
};

/**
 * 时段判定状态。
 * - open：处于交易时段内
 * - noSession：当天无交易时段（如周六）
 * - closedDate：当天为配置的休市日
 * - beforeOpen / afterClose：当天有时段但不在区间内
 */
export type SessionStatus = 'open' | 'noSession' | 'closedDate' | 'beforeOpen' | 'afterClose';

/**
 * 时段解析结果。
 * 类型用途：isMarketOpen 与 describeSchedule 共用的唯一判定结果，保证日志描述与门禁判定一致。
 * 数据来源：resolveSession 根据时间与日历配置计算。
 * 使用范围：交易日历及调用方日志。
 */
export type SessionResolution = {
  readonly dateKey: string;
  readonly weekday: Weekday;
  readonly localTime: string;
  readonly window: SessionWindow | null;
  readonly status: SessionStatus;
  readonly isOpen: boolean;
};

/**
 * 交易日历接口（行为契约）。
 * 全部方法为纯函数，不读取系统时间。
 */
export interface SessionCalendar {
  isMarketOpen(date: Date): boolean;
  resolveSession(date: Date): SessionResolution;
  describeSchedule(date: Date): string;
  getNextSessionOpen(date: Date): Date | null;
}
