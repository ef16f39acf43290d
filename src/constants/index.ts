/**
 * 全局常量模块
 *
 * 统一管理项目中使用的所有常量，包括：
 * - 时间相关：毫秒换算、尼泊尔时区偏移
 * - 交易时段：默认交易时段、星期名称
 * - 日志相关：日志级别、流超时配置
 * - API相关：NepseAPI 端点、请求头、超时默认值
 * - 采集相关：文件命名前缀、采集方式标识
 */
import type { SessionWindow } from '../types/session.js';
import type { EndpointDefinition } from '../types/dataSource.js';

/** 时间相关常量 */
export const TIME = {
  /** 每秒的毫秒数 */
  MILLISECONDS_PER_SECOND: 1000,
  /** 每分钟的毫秒数 */
  MILLISECONDS_PER_MINUTE: 60_000,
  /** 每天的毫秒数 */
  MILLISECONDS_PER_DAY: 24 * 60 * 60 * 1000,
  /** 尼泊尔时区偏移量（毫秒），UTC+5:45，无夏令时 */
  NEPAL_TIMEZONE_OFFSET_MS: (5 * 60 + 45) * 60 * 1000,
} as const;

/** 日期键格式（YYYY-MM-DD） */
export const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** 时段时间格式（HH:mm） */
export const SESSION_TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

/** 星期代码，下标与 Date#getUTCDay 一致（0 = 周日） */
export const WEEKDAY_CODES = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'] as const;

/** 星期中文名称，用于日志输出 */
export const WEEKDAY_LABELS = ['周日', '周一', '周二', '周三', '周四', '周五', '周六'] as const;

/**
 * 默认交易时段
 * 周日至周四 11:00-15:00，周五 11:00-13:00，周六休市
 */
export const DEFAULT_SESSION_WINDOWS: ReadonlyArray<SessionWindow> = [
  {
    label: '标准时段',
    weekdays: [0, 1, 2, 3, 4],
    openMinute: 11 * 60,
    closeMinute: 15 * 60,
  },
  {
    label: '周五短时段',
    weekdays: [5],
    openMinute: 11 * 60,
    closeMinute: 13 * 60,
  },
];

/** 查找下一交易时段时的最大扫描天数 */
export const NEXT_SESSION_SCAN_DAYS = 14;

/** 日志级别常量（pino 自定义级别） */
export const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

/** 日志相关常量 */
export const LOGGING = {
  /** 控制台流 drain 超时时间（毫秒） */
  CONSOLE_DRAIN_TIMEOUT_MS: 3000,
  /** 系统日志子目录 */
  SYSTEM_SUBDIR: 'system',
  /** 调试日志子目录（仅 DEBUG=true 时写入） */
  DEBUG_SUBDIR: 'debug',
} as const;

/** NepseAPI 相关常量 */
export const NEPSE_API = {
  /** 默认服务地址（本地启动的 NepseAPI） */
  DEFAULT_BASE_URL: 'http://localhost:8000',
  /** 请求头 User-Agent */
  USER_AGENT: 'NEPSE-Snapshot-Collector/1.0',
  /** 可达性探测路径 */
  PROBE_PATH: '/',
  /** 市场开闭状态路径 */
  MARKET_STATUS_PATH: '/IsNepseOpen',
  /** 默认单次请求超时（毫秒） */
  DEFAULT_REQUEST_TIMEOUT_MS: 30_000,
  /** 默认探测超时（毫秒） */
  DEFAULT_PROBE_TIMEOUT_MS: 10_000,
} as const;

/** 采集端点列表（按顺序逐个请求） */
export const NEPSE_ENDPOINTS: ReadonlyArray<EndpointDefinition> = [
  { name: 'floorsheet', path: '/Floorsheet' },
  { name: 'price_volume', path: '/PriceVolume' },
  { name: 'live_market', path: '/LiveMarket' },
  { name: 'summary', path: '/Summary' },
  { name: 'top_gainers', path: '/TopGainers' },
  { name: 'top_losers', path: '/TopLosers' },
  { name: 'nepse_index', path: '/NepseIndex' },
  { name: 'supply_demand', path: '/SupplyDemand' },
];

/** 采集相关常量 */
export const COLLECTION = {
  /** 采集方式标识，写入每条记录 */
  METHOD: 'cloud_automated',
  /** 快照 CSV 文件前缀 */
  ARTIFACT_PREFIX: 'nepse_snapshot',
  /** 单次采集汇总 JSON 文件前缀 */
  SUMMARY_PREFIX: 'nepse_summary',
  /** 运行汇总日志文件名（JSON Lines，仅追加） */
  RUN_SUMMARY_FILE: 'run-summary.jsonl',
  /** 同名文件存在时追加序号的上限 */
  MAX_NAME_SUFFIX: 99,
  /** 未配置 RUN_LABEL 与 GITHUB_RUN_NUMBER 时的运行标识 */
  DEFAULT_RUN_LABEL: 'local',
} as const;
