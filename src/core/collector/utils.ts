import { COLLECTION } from '../../constants/index.js';
import { formatError, isDataSourceError } from '../../utils/error/index.js';
import { isPlainRecord } from '../../utils/primitives/index.js';
import { toNepalDateTime, toNepalIso } from '../../utils/time/index.js';
import type {
  ArtifactSummary,
  CellValue,
  CollectionOutcome,
  NormalizedRow,
  RunSummaryRecord,
} from '../../types/collection.js';
import type { EndpointName, SnapshotSection } from '../../types/dataSource.js';
import type { BuildRowsParams } from './types.js';

/**
 * 规范化字段名：转小写，空格替换为下划线。
 */
function cleanKey(key: string): string {
  return key.toLowerCase().replaceAll(' ', '_');
}

/**
 * 转换为 CSV 单元格值：嵌套结构写为 JSON 文本，undefined 与非有限数字写为 null。
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

type SectionRecord = {
  readonly recordId: string;
  readonly fields: Readonly<Record<string, unknown>>;
};

function listSectionRecords(section: SnapshotSection): SectionRecord[] {
  const { source, payload } = section;
  if (!Array.isArray(payload)) {
    return isPlainRecord(payload) ? [{ recordId: `${source}_summary`, fields: payload }] : [];
  }
  const records: SectionRecord[] = [];
  payload.forEach((item: unknown, index: number) => {
    if (isPlainRecord(item)) {
      records.push({ recordId: `${source}_${index + 1}`, fields: item });
    }
  });
  return records;
}

/**
 * 将快照展开为规范化记录行。
 * 每行依次包含采集元数据、原始字段（规范化键名）以及运行级字段（端点数、端点列表、运行标识）。
 *
 * @returns 规范化行与实际产出记录的端点列表
 */
export function buildSnapshotRows({ snapshot, timestamp, marketOpen, runLabel }: BuildRowsParams): {
  readonly rows: NormalizedRow[];
  readonly endpoints: EndpointName[];
} {
  const collectionTimestamp = toNepalIso(timestamp);
  const collectionTimeNpt = toNepalDateTime(timestamp);
  const baseRows: Record<string, CellValue>[] = [];
  const endpoints: EndpointName[] = [];

  for (const section of snapshot.sections) {
    const records = listSectionRecords(section);
    if (records.length === 0) {
      continue;
    }
    if (!endpoints.includes(section.source)) {
      endpoints.push(section.source);
    }
    for (const record of records) {
      const row: Record<string, CellValue> = {
        collection_timestamp: collectionTimestamp,
        collection_time_npt: collectionTimeNpt,
        data_source: section.source,
        record_id: record.recordId,
        market_open: marketOpen,
        collection_method: COLLECTION.METHOD,
      };
      for (const [key, value] of Object.entries(record.fields)) {
        row[cleanKey(key)] = toCellValue(value);
      }
      baseRows.push(row);
    }
  }

  const endpointsText = endpoints.join(', ');
  const rows = baseRows.map((row) => ({
    ...row,
    total_endpoints_collected: endpoints.length,
    endpoints_collected: endpointsText,
    run_label: runLabel,
  }));
  return { rows, endpoints };
}

/**
 * 构建单次采集汇总（文件名由产物存储补充）。
 */
export function buildArtifactSummary(params: {
  readonly timestamp: Date;
  readonly rows: ReadonlyArray<NormalizedRow>;
  readonly endpoints: ReadonlyArray<EndpointName>;
  readonly failedEndpoints: ReadonlyArray<EndpointName>;
  readonly marketOpen: boolean;
  readonly runLabel: string;
}): ArtifactSummary {
  const recordsBySource: Record<string, number> = {};
  for (const row of params.rows) {
    const source = String(row['data_source']);
    recordsBySource[source] = (recordsBySource[source] ?? 0) + 1;
  }
  return {
    collectionTime: toNepalIso(params.timestamp),
    totalRecords: params.rows.length,
    successfulEndpoints: params.endpoints,
    failedEndpoints: params.failedEndpoints,
    recordsBySource,
    marketOpen: params.marketOpen,
    collectionMethod: COLLECTION.METHOD,
    runLabel: params.runLabel,
  };
}

/**
 * 将数据源阶段的错误归类为失败结果。
 * timeout 与 transport 归为 TransportError（超时原因为 timeout），malformed 归为 MalformedResponse。
 */
export function classifyFetchError(err: unknown): Extract<CollectionOutcome, { kind: 'failure' }> {
  if (isDataSourceError(err)) {
    if (err.errorType === 'timeout') {
      return { kind: 'failure', errorType: 'TransportError', reason: 'timeout' };
    }
    if (err.errorType === 'malformed') {
      return { kind: 'failure', errorType: 'MalformedResponse', reason: err.message };
    }
    return { kind: 'failure', errorType: 'TransportError', reason: err.message };
  }
  return { kind: 'failure', errorType: 'TransportError', reason: formatError(err) };
}

/**
 * 根据采集结果构建运行汇总记录。
 */
export function buildRunSummaryRecord(
  timestamp: Date,
  outcome: CollectionOutcome,
  runLabel: string,
): RunSummaryRecord {
  return {
    timestamp: timestamp.toISOString(),
    timestampNpt: toNepalDateTime(timestamp),
    outcome: outcome.kind,
    artifactPath: outcome.kind === 'success' ? outcome.artifactPath : null,
    errorType: outcome.kind === 'failure' ? outcome.errorType : null,
    reason:
      outcome.kind === 'failure'
        ? outcome.reason
        : outcome.kind === 'marketClosed'
          ? outcome.detail
          : null,
    recordCount: outcome.kind === 'success' ? outcome.recordCount : 0,
    runLabel,
  };
}
