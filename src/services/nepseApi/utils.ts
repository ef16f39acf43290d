import { isAxiosError } from 'axios';
import { createDataSourceError, formatError, isDataSourceError } from '../../utils/error/index.js';
import { isPlainRecord } from '../../utils/primitives/index.js';
import type { DataSourceError } from '../../types/dataSource.js';
import type { EndpointPayload, MarketStatus } from './types.js';

const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * 将请求过程中的任意错误归类为数据源错误。
 * 超时（ECONNABORTED/ETIMEDOUT）归为 timeout，其余网络错误归为 transport。
 */
export function toDataSourceError(err: unknown): DataSourceError {
  if (isDataSourceError(err)) {
    return err;
  }
  if (isAxiosError(err)) {
    if (err.code !== undefined && TIMEOUT_ERROR_CODES.has(err.code)) {
      return createDataSourceError('timeout', 'timeout');
    }
    return createDataSourceError('transport', err.code ? `${err.code}: ${err.message}` : err.message);
  }
  return createDataSourceError('transport', formatError(err));
}

/**
 * 解析响应体：字符串按 JSON 解析（空串视为 null），解析失败抛出 malformed。
 */
export function parseResponseBody(data: unknown, path: string): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  const text = data.trim();
  if (text === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw createDataSourceError('malformed', `${path} 返回的内容不是有效 JSON`);
  }
}

/**
 * 解析端点数据。
 * 数组取其中的对象记录，对象视为单条汇总记录；null、空数组、空对象视为无数据；其他类型为 malformed。
 */
export function parseEndpointPayload(body: unknown, path: string): EndpointPayload {
  if (body === null || body === undefined) {
    return { kind: 'empty' };
  }
  if (Array.isArray(body)) {
    const count = body.filter(isPlainRecord).length;
    return count === 0 ? { kind: 'empty' } : { kind: 'data', payload: body, count };
  }
  if (isPlainRecord(body)) {
    return Object.keys(body).length === 0 ? { kind: 'empty' } : { kind: 'data', payload: body, count: 1 };
  }
  throw createDataSourceError('malformed', `${path} 返回了无法识别的数据类型: ${typeof body}`);
}

/**
 * 解析市场开闭状态（NepseAPI /IsNepseOpen，形如 { isOpen: "OPEN" | "CLOSE" }）。
 * false、"CLOSE"、"CLOSED" 视为休市；true 或其他非空字符串视为开市；其余结构为 malformed。
 */
export function parseMarketStatus(body: unknown, path: string): MarketStatus {
  if (!isPlainRecord(body)) {
    throw createDataSourceError('malformed', `${path} 返回的市场状态格式无效`);
  }
  const isOpen = body['isOpen'];
  if (typeof isOpen === 'boolean') {
    return { state: isOpen ? 'open' : 'closed', detail: String(isOpen) };
  }
  if (typeof isOpen === 'string' && isOpen.trim() !== '') {
    const normalized = isOpen.trim().toUpperCase();
    const closed = normalized === 'CLOSE' || normalized === 'CLOSED';
    return { state: closed ? 'closed' : 'open', detail: isOpen.trim() };
  }
  throw createDataSourceError('malformed', `${path} 返回的市场状态缺少 isOpen 字段`);
}
