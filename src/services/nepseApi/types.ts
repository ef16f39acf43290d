import type { AxiosInstance } from 'axios';
import type { Logger } from '../../utils/logger/types.js';
import type { EndpointDefinition } from '../../types/dataSource.js';

/**
 * NepseAPI 数据源的依赖注入对象。
 * 类型用途：createNepseApiDataSource() 的入参，提供 HTTP 客户端、探测超时、端点列表与日志。
 * 数据来源：入口根据配置组装；测试中注入使用进程内 adapter 的 axios 实例。
 * 使用范围：仅 nepseApi 模块与测试使用。
 */
export type NepseApiDataSourceDeps = {
  readonly httpClient: AxiosInstance;
  readonly probeTimeoutMs: number;
  readonly endpoints: ReadonlyArray<EndpointDefinition>;
  readonly logger: Logger;
};

/**
 * HTTP 客户端创建参数。
 */
export type NepseHttpClientOptions = {
  readonly baseUrl: string;
  readonly timeoutMs: number;
};

/**
 * 市场状态解析结果：open / closed（附上游原文）。
 */
export type MarketStatus =
  | { readonly state: 'open'; readonly detail: string }
  | { readonly state: 'closed'; readonly detail: string };

/**
 * 端点数据解析结果：empty 表示无记录（跳过），data 为可用载荷。
 */
export type EndpointPayload =
  | { readonly kind: 'empty' }
  | {
      readonly kind: 'data';
      readonly payload: ReadonlyArray<unknown> | Readonly<Record<string, unknown>>;
      readonly count: number;
    };
