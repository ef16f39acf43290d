/**
 * NepseAPI 数据源业务测试
 *
 * 功能：
 * - 通过进程内 axios adapter 验证探测、市场状态与端点采集
 * - 验证单端点失败跳过、全部失败时按首个错误抛出
 * - 验证超时与无法解析响应的错误类别
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { createNepseApiDataSource, createNepseHttpClient } from '../../src/services/nepseApi/index.js';
import { parseEndpointPayload, parseMarketStatus } from '../../src/services/nepseApi/utils.js';
import { isDataSourceError } from '../../src/utils/error/index.js';
import { createSilentLogger } from '../helpers/testDoubles.js';
import type { EndpointDefinition } from '../../src/types/dataSource.js';

type RouteReply =
  | { readonly status: number; readonly data: unknown }
  | { readonly timeout: true }
  | { readonly networkError: string };

type RecordedRequest = {
  readonly url: string;
  readonly timeout: number | undefined;
  readonly userAgent: string;
};

const ENDPOINTS: ReadonlyArray<EndpointDefinition> = [
  { name: 'floorsheet', path: '/Floorsheet' },
  { name: 'live_market', path: '/LiveMarket' },
  { name: 'summary', path: '/Summary' },
];

function createFakeAdapter(routes: Readonly<Record<string, RouteReply>>): {
  readonly adapter: AxiosAdapter;
  readonly requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const url = config.url ?? '';
    requests.push({ url, timeout: config.timeout, userAgent: String(config.headers.get('User-Agent')) });
    const reply = routes[url] ?? { status: 404, data: { detail: 'Not Found' } };
    if ('timeout' in reply) {
      throw new AxiosError(`timeout of ${config.timeout ?? 0}ms exceeded`, 'ECONNABORTED', config);
    }
    if ('networkError' in reply) {
      throw new AxiosError(reply.networkError, 'ECONNREFUSED', config);
    }
    return { data: reply.data, status: reply.status, statusText: '', headers: {}, config };
  };
  return { adapter, requests };
}

function createDataSource(routes: Readonly<Record<string, RouteReply>>) {
  const { adapter, requests } = createFakeAdapter(routes);
  const httpClient = createNepseHttpClient({ baseUrl: 'http://nepse.test', timeoutMs: 5000 });
  httpClient.defaults.adapter = adapter;
  const dataSource = createNepseApiDataSource({
    httpClient,
    probeTimeoutMs: 2000,
    endpoints: ENDPOINTS,
    logger: createSilentLogger(),
  });
  return { dataSource, requests };
}

describe('可达性探测', () => {
  it('200 视为可达，使用探测超时与请求头', async () => {
    const { dataSource, requests } = createDataSource({ '/': { status: 200, data: { message: 'ok' } } });
    assert.equal(await dataSource.probe(), true);
    assert.deepEqual(requests, [{ url: '/', timeout: 2000, userAgent: 'NEPSE-Snapshot-Collector/1.0' }]);
  });

  it('非 200 或连接失败视为不可达', async () => {
    assert.equal(await createDataSource({ '/': { status: 503, data: '' } }).dataSource.probe(), false);
    assert.equal(
      await createDataSource({ '/': { networkError: 'connect ECONNREFUSED' } }).dataSource.probe(),
      false,
    );
  });
});

describe('可达性探测超时', () => {
  it('探测超时抛出 timeout 错误', async () => {
    const { dataSource } = createDataSource({ '/': { timeout: true } });
    await assert.rejects(dataSource.probe(), (err: unknown) => {
      assert.ok(isDataSourceError(err));
      assert.equal(err.errorType, 'timeout');
      return true;
    });
  });
});

describe('fetchSnapshot', () => {
  it('上游报告休市时返回 closed 且不请求端点', async () => {
    const { dataSource, requests } = createDataSource({
      '/IsNepseOpen': { status: 200, data: { isOpen: 'CLOSE', asOf: '2026-10-17T12:00:00' } },
    });
    assert.deepEqual(await dataSource.fetchSnapshot(), { status: 'closed', detail: 'CLOSE' });
    assert.deepEqual(
      requests.map((request) => request.url),
      ['/IsNepseOpen'],
    );
  });

  it('跳过失败与空端点，保留有数据的端点', async () => {
    const liveMarket = [
      { Symbol: 'ABC', LTP: 512.5 },
      { Symbol: 'XYZ', LTP: 1020 },
    ];
    const { dataSource, requests } = createDataSource({
      '/IsNepseOpen': { status: 200, data: { isOpen: 'OPEN' } },
      '/Floorsheet': { status: 500, data: 'Internal Server Error' },
      '/LiveMarket': { status: 200, data: liveMarket },
      '/Summary': { status: 200, data: {} },
    });
    assert.deepEqual(await dataSource.fetchSnapshot(), {
      status: 'ok',
      snapshot: {
        sections: [{ source: 'live_market', payload: liveMarket }],
        failedEndpoints: [{ source: 'floorsheet', reason: '/Floorsheet HTTP 500' }],
      },
    });
    assert.deepEqual(
      requests.map((request) => request.timeout),
      [5000, 5000, 5000, 5000],
    );
  });

  it('市场状态接口 404 时跳过开闭市检查', async () => {
    const { dataSource } = createDataSource({
      '/Summary': { status: 200, data: { 'Total Turnover': 1_500_000 } },
    });
    const result = await dataSource.fetchSnapshot();
    assert.equal(result.status, 'ok');
    if (result.status !== 'ok') {
      return;
    }
    assert.deepEqual(result.snapshot.sections, [{ source: 'summary', payload: { 'Total Turnover': 1_500_000 } }]);
    assert.deepEqual(
      result.snapshot.failedEndpoints.map((failure) => failure.source),
      ['floorsheet', 'live_market'],
    );
  });

  it('全部端点超时时抛出 timeout 错误', async () => {
    const { dataSource } = createDataSource({
      '/IsNepseOpen': { status: 200, data: { isOpen: true } },
      '/Floorsheet': { timeout: true },
      '/LiveMarket': { timeout: true },
      '/Summary': { timeout: true },
    });
    await assert.rejects(dataSource.fetchSnapshot(), (err: unknown) => {
      assert.ok(isDataSourceError(err));
      assert.equal(err.errorType, 'timeout');
      assert.equal(err.message, 'timeout');
      return true;
    });
  });

  it('全部端点返回非 JSON 内容时抛出 malformed 错误', async () => {
    const html = { status: 200, data: '<html>maintenance</html>' };
    const { dataSource } = createDataSource({
      '/IsNepseOpen': { status: 200, data: { isOpen: 'OPEN' } },
      '/Floorsheet': html,
      '/LiveMarket': html,
      '/Summary': html,
    });
    await assert.rejects(dataSource.fetchSnapshot(), (err: unknown) => {
      assert.ok(isDataSourceError(err));
      assert.equal(err.errorType, 'malformed');
      assert.equal(err.message, '/Floorsheet 返回的内容不是有效 JSON');
      return true;
    });
  });

  it('市场状态缺少 isOpen 时抛出 malformed 错误', async () => {
    const { dataSource } = createDataSource({
      '/IsNepseOpen': { status: 200, data: { state: 'unknown' } },
    });
    await assert.rejects(dataSource.fetchSnapshot(), (err: unknown) => {
      assert.ok(isDataSourceError(err));
      assert.equal(err.errorType, 'malformed');
      return true;
    });
  });
});

describe('payload parsing', () => {
  it('解析市场状态取值', () => {
    assert.deepEqual(parseMarketStatus({ isOpen: false }, '/IsNepseOpen'), { state: 'closed', detail: 'false' });
    assert.deepEqual(parseMarketStatus({ isOpen: ' closed ' }, '/IsNepseOpen'), {
      state: 'closed',
      detail: 'closed',
    });
    assert.deepEqual(parseMarketStatus({ isOpen: 'PRE_OPEN' }, '/IsNepseOpen'), {
      state: 'open',
      detail: 'PRE_OPEN',
    });
  });

  it('解析端点数据', () => {
    assert.deepEqual(parseEndpointPayload(null, '/Summary'), { kind: 'empty' });
    assert.deepEqual(parseEndpointPayload([1, 2], '/Summary'), { kind: 'empty' });
    assert.deepEqual(parseEndpointPayload([{ a: 1 }, 2], '/Summary'), {
      kind: 'data',
      payload: [{ a: 1 }, 2],
      count: 1,
    });
    assert.throws(() => parseEndpointPayload(42, '/Summary'), (err: unknown) => isDataSourceError(err));
  });
});
