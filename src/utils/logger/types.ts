import type { LOG_LEVELS } from '../../constants/index.js';

/**
 * 日志对象接口
 * 用途：描述单条结构化日志记录的数据结构，供日志格式化器序列化输出
 * 数据来源：由 pino 按 logger 各级别方法（debug/info/warn/error）输出的 JSON 行解析得到
 * 使用范围：仅 logger 模块内部使用
 */
export type LogObject = {
  readonly level: (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];
  readonly time: number;
  readonly msg: string;
  readonly extra?: unknown;
};

/**
 * Logger 接口定义
 * 用途：定义日志记录器的公开方法契约，供业务模块注入和调用
 * 数据来源：由 createLogger 工厂函数实现并返回
 * 使用范围：全局使用，业务模块通过依赖注入获取实例
 */
export interface Logger {
  debug(msg: string, extra?: unknown): void;
  info(msg: string, extra?: unknown): void;
  warn(msg: string, extra?: unknown): void;
  error(msg: string, extra?: unknown): void;
}

/**
 * 带刷新能力的日志记录器，进程退出前调用 flush 关闭文件流。
 */
export interface FlushableLogger extends Logger {
  flush(): Promise<void>;
}

/**
 * createLogger 的入参。
 * 用途：指定日志根目录与是否启用 DEBUG 级别
 * 数据来源：配置模块（LOG_DIR、DEBUG）
 * 使用范围：入口与日志测试
 */
export type LoggerOptions = {
  readonly logDir: string;
  readonly debug: boolean;
  readonly now?: () => Date;
};
