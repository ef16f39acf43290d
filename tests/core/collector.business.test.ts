/**
 * collector 业务测试
 *
 * 功能：
 * - 验证成功采集写入 CSV、单次汇总与运行汇总
 * - 验证上游休市、超时、不可达、无数据与写入失败的结果归类
 * - 验证失败运行不留下产物，每次运行只追加一条运行汇总
 */
import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { AxiosError } from 'axios';
import type { AxiosAdapter } from 'axios';
import { createCollector } from '../../src/core/collector/index.js';
import { createSessionCalendar } from '../../src/core/sessionCalendar/index.js';
import { createArtifactStore } from '../../src/services/artifactStore/index.js';
import { DEFAULT_SESSION_WINDOWS, NEPSE_ENDPOINTS } from '../../src/constants/index.js';
import { createDataSourceError } from '../../src/utils/error/index.js';
import { createNepseApiDataSource, createNepseHttpClient } from '../../src/services/nepseApi/index.js';
import {
  createFakeDataSource,
  createRecordingLogger,
  createSnapshot,
  createTempDir,
  fixedClock,
  removeDir,
} from '../helpers/testDoubles.js';
import type { DataSource } from '../../src/types/dataSource.js';
import type { Logger } from '../../src/utils/logger/types.js';

const calendar = createSessionCalendar({ windows: DEFAULT_SESSION_WINDOWS, closedDates: new Set() });

let tempDir = '';

beforeEach(() => {
  tempDir = createTempDir('nepse-collector-');
});

afterEach(() => {
  removeDir(tempDir);
});

function buildCollector(options: {
  readonly dataSource: DataSource;
  readonly now?: () => Date;
  readonly dataDir?: string;
  readonly logDir?: string;
  readonly logger?: Logger;
}) {
  const logger = options.logger ?? createRecordingLogger();
  return createCollector({
    now: options.now ?? fixedClock('2026-10-15T06:15:00.000Z'),
    calendar,
    dataSource: options.dataSource,
    artifactStore: createArtifactStore({
      dataDir: options.dataDir ?? path.join(tempDir, 'data'),
      logDir: options.logDir ?? path.join(tempDir, 'logs'),
      logger,
    }),
    logger,
    runLabel: '7',
  });
}

function readRunSummaryLines(): unknown[] {
  const content = fs.readFileSync(path.join(tempDir, 'logs', 'run-summary.jsonl'), 'utf8');
  return content
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line));
}

function listDataFiles(): string[] {
  const dataDir = path.join(tempDir, 'data');
  return fs.existsSync(dataDir) ? fs.readdirSync(dataDir).sort() : [];
}

describe('collectSingleRun success', () => {
  it('写入 CSV、单次汇总与运行汇总', async () => {
    const collector = buildCollector({ dataSource: createFakeDataSource({}) });
    const outcome = await collector.collectSingleRun();

    const artifactPath = path.join(tempDir, 'data', 'nepse_snapshot_20261015_120000.csv');
    const summaryPath = path.join(tempDir, 'data', 'nepse_summary_20261015_120000.json');
    assert.deepEqual(outcome, {
      kind: 'success',
      artifactPath,
      summaryPath,
      recordCount: 3,
      endpoints: ['live_market', 'nepse_index'],
    });

    const lines = fs.readFileSync(artifactPath, 'utf8').split('\n');
    assert.equal(
      lines[0],
      'collection_timestamp,collection_time_npt,data_source,record_id,market_open,collection_method,' +
        'symbol,last_traded_price,total_endpoints_collected,endpoints_collected,run_label,index_value,change',
    );
    assert.equal(
      lines[1],
      '2026-10-15T12:00:00.000+05:45,2026-10-15 12:00:00,live_market,live_market_1,True,cloud_automated,' +
        'ABC,512.5,2,"live_market, nepse_index",7,,',
    );
    assert.equal(
      lines[3],
      '2026-10-15T12:00:00.000+05:45,2026-10-15 12:00:00,nepse_index,nepse_index_summary,True,cloud_automated,' +
        ',,2,"live_market, nepse_index",7,2750.25,-3.5',
    );

    const summary: unknown = JSON.parse(fs.readFileSync(summaryPath, 'utf8'));
    assert.deepEqual(summary, {
      collectionTime: '2026-10-15T12:00:00.000+05:45',
      totalRecords: 3,
      successfulEndpoints: ['live_market', 'nepse_index'],
      failedEndpoints: [],
      recordsBySource: { live_market: 2, nepse_index: 1 },
      marketOpen: true,
      collectionMethod: 'cloud_automated',
      runLabel: '7',
      filename: 'nepse_snapshot_20261015_120000.csv',
    });

    assert.deepEqual(readRunSummaryLines(), [
      {
        timestamp: '2026-10-15T06:15:00.000Z',
        timestampNpt: '2026-10-15 12:00:00',
        outcome: 'success',
        artifactPath,
        errorType: null,
        reason: null,
        recordCount: 3,
        runLabel: '7',
      },
    ]);
  });

  it('不同时间戳产生不同文件，相同时间戳追加序号', async () => {
    let current = Date.parse('2026-10-15T06:15:00.000Z');
    const collector = buildCollector({
      dataSource: createFakeDataSource({}),
      now: () => new Date(current),
    });
    await collector.collectSingleRun();
    current += 1000;
    await collector.collectSingleRun();
    await collector.collectSingleRun();

    assert.deepEqual(listDataFiles(), [
      'nepse_snapshot_20261015_120000.csv',
      'nepse_snapshot_20261015_120001.csv',
      'nepse_snapshot_20261015_120001_1.csv',
      'nepse_summary_20261015_120000.json',
      'nepse_summary_20261015_120001.json',
      'nepse_summary_20261015_120001_1.json',
    ]);
    assert.equal(readRunSummaryLines().length, 3);
  });

  it('isMarketOpen 与 describeSchedule 使用注入时钟', () => {
    const collector = buildCollector({
      dataSource: createFakeDataSource({}),
      now: fixedClock('2026-10-17T06:15:00.000Z'),
    });
    assert.equal(collector.isMarketOpen(), false);
    assert.equal(
      collector.describeSchedule(),
      '周六 无交易时段，当前 NPT 12:00:00，休市；下一交易时段 2026-10-18 周日 11:00',
    );
  });
});

describe('collectSingleRun non-success outcomes', () => {
  it('上游报告休市时返回 marketClosed 且不写产物', async () => {
    const logger = createRecordingLogger();
    const collector = buildCollector({
      dataSource: createFakeDataSource({ fetch: async () => ({ status: 'closed', detail: 'CLOSE' }) }),
      logger,
    });
    const outcome = await collector.collectSingleRun();
    assert.deepEqual(outcome, { kind: 'marketClosed', detail: 'CLOSE' });
    assert.deepEqual(listDataFiles(), []);
    assert.equal(logger.entries.some((entry) => entry.level === 'error'), false);
    assert.deepEqual(readRunSummaryLines(), [
      {
        timestamp: '2026-10-15T06:15:00.000Z',
        timestampNpt: '2026-10-15 12:00:00',
        outcome: 'marketClosed',
        artifactPath: null,
        errorType: null,
        reason: 'CLOSE',
        recordCount: 0,
        runLabel: '7',
      },
    ]);
  });

  it('超时返回 TransportError(timeout)，不写产物，只追加一条汇总', async () => {
    const collector = buildCollector({
      dataSource: createFakeDataSource({
        fetch: async () => {
          throw createDataSourceError('timeout', 'timeout');
        },
      }),
    });
    const outcome = await collector.collectSingleRun();
    assert.deepEqual(outcome, { kind: 'failure', errorType: 'TransportError', reason: 'timeout' });
    assert.deepEqual(listDataFiles(), []);
    assert.deepEqual(readRunSummaryLines(), [
      {
        timestamp: '2026-10-15T06:15:00.000Z',
        timestampNpt: '2026-10-15 12:00:00',
        outcome: 'failure',
        artifactPath: null,
        errorType: 'TransportError',
        reason: 'timeout',
        recordCount: 0,
        runLabel: '7',
      },
    ]);
  });

  it('上游无响应时探测超时，结果为 TransportError(timeout)', async () => {
    const hangingAdapter: AxiosAdapter = async (config) => {
      throw new AxiosError(`timeout of ${config.timeout ?? 0}ms exceeded`, 'ECONNABORTED', config);
    };
    const httpClient = createNepseHttpClient({ baseUrl: 'http://nepse.test', timeoutMs: 1000 });
    httpClient.defaults.adapter = hangingAdapter;
    const dataSource = createNepseApiDataSource({
      httpClient,
      probeTimeoutMs: 1000,
      endpoints: NEPSE_ENDPOINTS,
      logger: createRecordingLogger(),
    });
    const collector = buildCollector({ dataSource });
    const outcome = await collector.collectSingleRun();
    assert.deepEqual(outcome, { kind: 'failure', errorType: 'TransportError', reason: 'timeout' });
    assert.deepEqual(listDataFiles(), []);
    assert.equal(readRunSummaryLines().length, 1);
  });

  it('探测失败时不请求快照', async () => {
    const dataSource = createFakeDataSource({ reachable: false });
    const collector = buildCollector({ dataSource });
    const outcome = await collector.collectSingleRun();
    assert.deepEqual(outcome, { kind: 'failure', errorType: 'TransportError', reason: '行情 API 不可达' });
    assert.equal(dataSource.calls.probe, 1);
    assert.equal(dataSource.calls.fetchSnapshot, 0);
  });

  it('无任何记录时返回 EmptyData', async () => {
    const collector = buildCollector({
      dataSource: createFakeDataSource({
        fetch: async () => ({ status: 'ok', snapshot: createSnapshot({ sections: [] }) }),
      }),
    });
    const outcome = await collector.collectSingleRun();
    assert.deepEqual(outcome, { kind: 'failure', errorType: 'EmptyData', reason: '所有端点均未返回记录' });
    assert.deepEqual(listDataFiles(), []);
  });

  it('数据目录不可写时返回 WriteError 且不留下产物', async () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const dataDir = path.join(blocker, 'data');
    const collector = buildCollector({ dataSource: createFakeDataSource({}), dataDir });
    const outcome = await collector.collectSingleRun();
    assert.equal(outcome.kind, 'failure');
    assert.equal(outcome.kind === 'failure' ? outcome.errorType : null, 'WriteError');
    assert.equal(fs.existsSync(dataDir), false);
    const [record] = readRunSummaryLines();
    assert.ok(record !== null && typeof record === 'object');
    assert.equal(Reflect.get(record, 'artifactPath'), null);
    assert.equal(Reflect.get(record, 'errorType'), 'WriteError');
  });

  it('运行汇总追加失败时记录错误且不改变结果', async () => {
    const logDir = path.join(tempDir, 'logs-file');
    fs.writeFileSync(logDir, 'occupied');
    const logger = createRecordingLogger();
    const collector = buildCollector({ dataSource: createFakeDataSource({}), logDir, logger });
    const outcome = await collector.collectSingleRun();
    assert.equal(outcome.kind, 'success');
    const errors = logger.entries.filter((entry) => entry.level === 'error');
    assert.equal(errors.length, 1);
    assert.ok(errors[0]?.msg.startsWith('[采集] 运行汇总追加失败: '));
  });
});
