/**
 * NepseAPI 数据源模块
 *
 * 功能：
 * - 可达性探测（GET /），探测超时以 timeout 错误抛出
 * - 读取市场开闭状态（GET /IsNepseOpen），上游报告休市时返回 closed
 * - 逐个请求采集端点并组装市场快照
 *
 * 错误处理：
 * - 单个端点失败仅记录并跳过；全部端点失败时抛出首个端点的错误
 * - 抛出的错误均为 DataSourceError（timeout / transport / malformed）
 */
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { NEPSE_API } from '../../constants/index.js';
import { createDataSourceError, formatError } from '../../utils/error/index.js';
import { parseEndpointPayload, parseMarketStatus, parseResponseBody, toDataSourceError } from './utils.js';
import type {
  DataSource,
  EndpointDefinition,
  EndpointFailure,
  SnapshotFetchResult,
  SnapshotSection,
} from '../../types/dataSource.js';
import type { MarketStatus, NepseApiDataSourceDeps, NepseHttpClientOptions } from './types.js';

/**
 * 创建 NepseAPI HTTP 客户端。
 * 状态码由调用方检查，不由 axios 抛错。
 */
export function createNepseHttpClient({ baseUrl, timeoutMs }: NepseHttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: baseUrl,
    timeout: timeoutMs,
    headers: {
      'User-Agent': NEPSE_API.USER_AGENT,
      Accept: 'application/json',
    },
    validateStatus: () => true,
  });
}

/**
 * 创建 NepseAPI 数据源。
 *
 * @param deps HTTP 客户端、探测超时、端点列表、日志
 * @returns DataSource 实现
 */
export function createNepseApiDataSource(deps: NepseApiDataSourceDeps): DataSource {
  const { httpClient, probeTimeoutMs, endpoints, logger } = deps;

  /**
   * GET 指定路径并返回解析后的响应体；非 200 状态抛出 transport 错误。
   * 返回 null 表示 404（仅市场状态路径使用）。
   */
  async function getJson(path: string, allowNotFound: boolean = false): Promise<unknown> {
    let status: number;
    let data: unknown;
    try {
      const response = await httpClient.get<unknown>(path);
      status = response.status;
      data = response.data;
    } catch (err) {
      throw toDataSourceError(err);
    }
    if (allowNotFound && status === 404) {
      return null;
    }
    if (status !== 200) {
      throw createDataSourceError('transport', `${path} HTTP ${status}`);
    }
    return parseResponseBody(data, path);
  }

  async function probe(): Promise<boolean> {
    try {
      const response = await httpClient.get<unknown>(NEPSE_API.PROBE_PATH, { timeout: probeTimeoutMs });
      if (response.status === 200) {
        logger.info('[NepseAPI] 服务可访问');
        return true;
      }
      logger.warn(`[NepseAPI] 探测返回状态 ${response.status}`);
      return false;
    } catch (err) {
      const error = toDataSourceError(err);
      // 超时需按 timeout 归类，不视为普通不可达
      if (error.errorType === 'timeout') {
        logger.warn(`[NepseAPI] 探测超时 (${probeTimeoutMs}ms)`);
        throw error;
      }
      logger.warn(`[NepseAPI] 无法连接服务: ${formatError(err)}`);
      return false;
    }
  }

  async function readMarketStatus(): Promise<MarketStatus | null> {
    const body = await getJson(NEPSE_API.MARKET_STATUS_PATH, true);
    if (body === null) {
      logger.warn(`[NepseAPI] ${NEPSE_API.MARKET_STATUS_PATH} 不可用，跳过上游开闭市检查`);
      return null;
    }
    return parseMarketStatus(body, NEPSE_API.MARKET_STATUS_PATH);
  }

  async function fetchEndpoint(endpoint: EndpointDefinition): Promise<SnapshotSection | null> {
    const body = await getJson(endpoint.path);
    const parsed = parseEndpointPayload(body, endpoint.path);
    if (parsed.kind === 'empty') {
      logger.warn(`[NepseAPI] ${endpoint.name}: 无数据`);
      return null;
    }
    logger.info(`[NepseAPI] ${endpoint.name}: ${parsed.count} 条记录`);
    return { source: endpoint.name, payload: parsed.payload };
  }

  async function fetchSnapshot(): Promise<SnapshotFetchResult> {
    const marketStatus = await readMarketStatus();
    if (marketStatus?.state === 'closed') {
      logger.info(`[NepseAPI] 上游报告市场休市 (${marketStatus.detail})`);
      return { status: 'closed', detail: marketStatus.detail };
    }

    const sections: SnapshotSection[] = [];
    const failedEndpoints: EndpointFailure[] = [];
    let firstError: unknown = null;

    for (const endpoint of endpoints) {
      logger.debug(`[NepseAPI] 请求 ${endpoint.name} (${endpoint.path})`);
      try {
        const section = await fetchEndpoint(endpoint);
        if (section) {
          sections.push(section);
        }
      } catch (err) {
        const reason = formatError(err);
        logger.warn(`[NepseAPI] ${endpoint.name} 请求失败: ${reason}`);
        failedEndpoints.push({ source: endpoint.name, reason });
        firstError ??= err;
      }
    }

    if (sections.length === 0 && failedEndpoints.length === endpoints.length && firstError !== null) {
      throw toDataSourceError(firstError);
    }

    return { status: 'ok', snapshot: { sections, failedEndpoints } };
  }

  return {
    probe,
    fetchSnapshot,
  };
}
