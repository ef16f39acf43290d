import type { SessionWindow } from '../types/session.js';

/**
 * 配置验证错误（含出错字段列表）。
 * 类型用途：封装配置验证失败时的错误信息，作为 validateAllConfig 抛出的错误类型。
 * 数据来源：由 createConfigValidationError 创建。
 * 使用范围：config 模块与入口。
 */
export type ConfigValidationError = Error & {
  readonly name: 'ConfigValidationError';
  readonly missingFields: ReadonlyArray<string>;
};

/**
 * 带上下限的数值配置读取参数。
 * 类型用途：作为 parseBoundedNumberConfig 的入参，从环境变量读取并校验范围内的数值。
 * 数据来源：调用方从 process.env 及配置键传入。
 * 使用范围：仅 config 模块内部使用。
 */
export type BoundedNumberConfig = {
  readonly env: NodeJS.ProcessEnv;
  readonly envKey: string;
  readonly defaultValue: number;
  readonly min: number;
  readonly max: number;
};

/**
 * 单项验证错误（字段名与错误消息）。
 */
export type FieldError = {
  readonly field: string;
  readonly message: string;
};

/**
 * 通用验证结果。
 * 类型用途：描述配置验证的通过/失败状态及错误列表，作为验证函数的返回类型。
 * 数据来源：由 validateConfigEnv 返回。
 * 使用范围：仅 config 模块内部使用。
 */
export type ValidationResult = {
  readonly valid: boolean;
  readonly errors: ReadonlyArray<FieldError>;
};

/**
 * 时段配置解析结果。
 */
export type SessionWindowsParseResult =
  | { readonly ok: true; readonly windows: ReadonlyArray<SessionWindow> }
  | { readonly ok: false; readonly error: string };
