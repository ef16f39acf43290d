import type { EndpointName } from './dataSource.js';

/**
 * 采集失败类别。
 */
export type CollectionErrorType = 'TransportError' | 'MalformedResponse' | 'EmptyData' | 'WriteError';

/**
 * 单次采集结果。
 * 类型用途：collectSingleRun 的返回值，三选一：成功（含产物路径）、上游报告休市、失败（含类别与原因）。
 * 数据来源：采集器。
 * 使用范围：采集器、入口、运行汇总。
 */
export type CollectionOutcome =
  | {
      readonly kind: 'success';
      readonly artifactPath: string;
      readonly summaryPath: string;
      readonly recordCount: number;
      readonly endpoints: ReadonlyArray<EndpointName>;
    }
  | {
      readonly kind: 'marketClosed';
      readonly detail: string;
    }
  | {
      readonly kind: 'failure';
      readonly errorType: CollectionErrorType;
      readonly reason: string;
    };

/**
 * 运行汇总记录（仅追加，不修改不删除）。
 * 类型用途：每次运行结束时写入 run-summary.jsonl 的一行，用于事后审计采集历史。
 * 数据来源：采集器根据 CollectionOutcome 构造。
 * 使用范围：采集器、产物存储。
 */
export type RunSummaryRecord = {
  readonly timestamp: string;
  readonly timestampNpt: string;
  readonly outcome: CollectionOutcome['kind'];
  readonly artifactPath: string | null;
  readonly errorType: CollectionErrorType | null;
  readonly reason: string | null;
  readonly recordCount: number;
  readonly runLabel: string;
};

/**
 * CSV 单元格取值。
 */
export type CellValue = string | number | boolean | null;

/**
 * 规范化后的单行记录（列名 -> 值）。
 */
export type NormalizedRow = Readonly<Record<string, CellValue>>;

/**
 * 单次采集汇总（写入 data 目录的 JSON 文件，文件名由存储层补充）。
 */
export type ArtifactSummary = {
  readonly collectionTime: string;
  readonly totalRecords: number;
  readonly successfulEndpoints: ReadonlyArray<EndpointName>;
  readonly failedEndpoints: ReadonlyArray<EndpointName>;
  readonly recordsBySource: Readonly<Record<string, number>>;
  readonly marketOpen: boolean;
  readonly collectionMethod: string;
  readonly runLabel: string;
};
