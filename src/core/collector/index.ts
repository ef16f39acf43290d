/**
 * 单次采集模块
 *
 * 职责：
 * - 探测上游可达性，获取市场快照
 * - 将快照规范化为记录行，写入 CSV 产物与单次汇总
 * - 每次运行追加一条运行汇总记录
 *
 * 执行流程：
 * 1. probe() 不可达 → failure/TransportError；探测超时 → failure/TransportError(timeout)
 * 2. fetchSnapshot() 上游报告休市 → marketClosed
 * 3. 数据源错误按类别归类；无任何记录 → failure/EmptyData
 * 4. 写入产物失败 → failure/WriteError（不留下产物）
 * 5. 追加运行汇总；追加失败仅记录错误日志，不改变结果
 *
 * 调用方负责在开市时调用 collectSingleRun，采集器内部不再检查交易日历。
 */
import { formatError } from '../../utils/error/index.js';
import { toNepalFileStamp } from '../../utils/time/index.js';
import {
  buildArtifactSummary,
  buildRunSummaryRecord,
  buildSnapshotRows,
  classifyFetchError,
} from './utils.js';
import type { CollectionOutcome } from '../../types/collection.js';
import type { MarketSnapshot } from '../../types/dataSource.js';
import type { Collector, CollectorDeps } from './types.js';

/**
 * 创建采集器。
 *
 * @param deps 时钟、交易日历、数据源、产物存储、日志与运行标识
 * @returns Collector 实例
 */
export function createCollector(deps: CollectorDeps): Collector {
  const { now, calendar, dataSource, artifactStore, logger, runLabel } = deps;

  function writeSnapshot(snapshot: MarketSnapshot, timestamp: Date): CollectionOutcome {
    const marketOpen = calendar.isMarketOpen(timestamp);
    const { rows, endpoints } = buildSnapshotRows({ snapshot, timestamp, marketOpen, runLabel });
    if (rows.length === 0) {
      return { kind: 'failure', errorType: 'EmptyData', reason: '所有端点均未返回记录' };
    }

    const summary = buildArtifactSummary({
      timestamp,
      rows,
      endpoints,
      failedEndpoints: snapshot.failedEndpoints.map((failure) => failure.source),
      marketOpen,
      runLabel,
    });

    try {
      const written = artifactStore.writeSnapshotArtifacts({
        stamp: toNepalFileStamp(timestamp),
        rows,
        summary,
      });
      return {
        kind: 'success',
        artifactPath: written.artifactPath,
        summaryPath: written.summaryPath,
        recordCount: rows.length,
        endpoints,
      };
    } catch (err) {
      return { kind: 'failure', errorType: 'WriteError', reason: formatError(err) };
    }
  }

  async function runCollection(timestamp: Date): Promise<CollectionOutcome> {
    try {
      const reachable = await dataSource.probe();
      if (!reachable) {
        return { kind: 'failure', errorType: 'TransportError', reason: '行情 API 不可达' };
      }
      const result = await dataSource.fetchSnapshot();
      if (result.status === 'closed') {
        return { kind: 'marketClosed', detail: result.detail };
      }
      return writeSnapshot(result.snapshot, timestamp);
    } catch (err) {
      return classifyFetchError(err);
    }
  }

  function logOutcome(outcome: CollectionOutcome): void {
    switch (outcome.kind) {
      case 'success':
        logger.info(
          `[采集] 成功: ${outcome.recordCount} 条记录，来自 ${outcome.endpoints.length} 个端点`,
          { artifactPath: outcome.artifactPath, summaryPath: outcome.summaryPath },
        );
        break;
      case 'marketClosed':
        logger.info(`[采集] 上游报告市场休市，跳过本次采集 (${outcome.detail})`);
        break;
      case 'failure':
        logger.error(`[采集] 失败 ${outcome.errorType}: ${outcome.reason}`);
        break;
    }
  }

  function appendSummary(timestamp: Date, outcome: CollectionOutcome): void {
    try {
      const summaryPath = artifactStore.appendRunSummary(
        buildRunSummaryRecord(timestamp, outcome, runLabel),
      );
      logger.debug(`[采集] 运行汇总已追加: ${summaryPath}`);
    } catch (err) {
      logger.error(`[采集] 运行汇总追加失败: ${formatError(err)}`);
    }
  }

  async function collectSingleRun(): Promise<CollectionOutcome> {
    const timestamp = now();
    logger.info(`[采集] 开始采集 (运行标识 ${runLabel})`);
    const outcome = await runCollection(timestamp);
    logOutcome(outcome);
    appendSummary(timestamp, outcome);
    return outcome;
  }

  return {
    isMarketOpen: (at?: Date) => calendar.isMarketOpen(at ?? now()),
    describeSchedule: (at?: Date) => calendar.describeSchedule(at ?? now()),
    collectSingleRun,
  };
}
