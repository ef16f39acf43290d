import type { ArtifactSummary, NormalizedRow, RunSummaryRecord } from '../../types/collection.js';
import type { Logger } from '../../utils/logger/types.js';

/**
 * 产物存储的创建参数。
 */
export type ArtifactStoreOptions = {
  readonly dataDir: string;
  readonly logDir: string;
  readonly logger: Logger;
};

/**
 * 写入快照产物的参数。
 * 类型用途：writeSnapshotArtifacts 的入参，stamp 为文件名时间戳（YYYYMMDD_HHmmss）。
 * 数据来源：采集器。
 * 使用范围：采集器与产物存储。
 */
export type WriteSnapshotParams = {
  readonly stamp: string;
  readonly rows: ReadonlyArray<NormalizedRow>;
  readonly summary: ArtifactSummary;
};

/**
 * 已写入的快照产物路径。
 */
export type WrittenArtifacts = {
  readonly artifactPath: string;
  readonly summaryPath: string;
};

/**
 * 产物存储接口（行为契约）。
 * - writeSnapshotArtifacts：独占创建 CSV 与汇总 JSON，失败时不留下产物
 * - appendRunSummary：向运行汇总日志追加一行，返回日志路径
 */
export interface ArtifactStore {
  writeSnapshotArtifacts(params: WriteSnapshotParams): WrittenArtifacts;
  appendRunSummary(record: RunSummaryRecord): string;
}
