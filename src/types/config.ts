import type { SessionCalendarConfig } from './session.js';

/**
 * 采集门禁模式：strict 按交易日历判断，skip 跳过判断（手动触发/开发调试）。
 */
export type GateMode = 'strict' | 'skip';

/**
 * 采集程序配置。
 * 类型用途：createConfig 的返回值，贯穿入口、日志、数据源与采集器的初始化。
 * 数据来源：环境变量（.env.local 由 dotenv 加载），缺省时使用默认值。
 * 使用范围：全局使用。
 */
export type CollectorConfig = {
  readonly apiBaseUrl: string;
  readonly requestTimeoutMs: number;
  readonly probeTimeoutMs: number;
  readonly dataDir: string;
  readonly logDir: string;
  readonly calendar: SessionCalendarConfig;
  readonly runLabel: string;
  readonly gateMode: GateMode;
  readonly debug: boolean;
};
