/**
 * 产物存储模块
 *
 * 职责：
 * - 快照 CSV 写入 <dataDir>/nepse_snapshot_YYYYMMDD_HHmmss.csv
 * - 单次采集汇总写入 <dataDir>/nepse_summary_YYYYMMDD_HHmmss.json
 * - 运行汇总追加到 <logDir>/run-summary.jsonl
 *
 * 文件均以独占方式创建（wx），同名已存在时追加序号，从不覆盖已有文件。
 */
import fs from 'node:fs';
import path from 'node:path';
import { COLLECTION } from '../../constants/index.js';
import { formatError } from '../../utils/error/index.js';
import { isFileExistsError, renderCsv } from './utils.js';
import type { RunSummaryRecord } from '../../types/collection.js';
import type {
  ArtifactStore,
  ArtifactStoreOptions,
  WriteSnapshotParams,
  WrittenArtifacts,
} from './types.js';

/**
 * 创建产物存储。
 *
 * @param options 数据目录、日志目录与日志记录器
 * @returns ArtifactStore 实现（同步文件写入，失败时抛出原始错误）
 */
export function createArtifactStore({ dataDir, logDir, logger }: ArtifactStoreOptions): ArtifactStore {
  // 清理失败只记录警告，调用方收到的始终是汇总写入的原始错误
  function removeArtifact(artifactPath: string): void {
    try {
      fs.rmSync(artifactPath, { force: true });
    } catch (err) {
      logger.warn(`[产物存储] 清理未完成的产物失败 (${artifactPath}): ${formatError(err)}`);
    }
  }

  function writeSnapshotArtifacts({ stamp, rows, summary }: WriteSnapshotParams): WrittenArtifacts {
    fs.mkdirSync(dataDir, { recursive: true });
    const csv = renderCsv(rows);

    for (let index = 0; index <= COLLECTION.MAX_NAME_SUFFIX; index += 1) {
      const suffix = index === 0 ? '' : `_${index}`;
      const artifactPath = path.join(dataDir, `${COLLECTION.ARTIFACT_PREFIX}_${stamp}${suffix}.csv`);
      const summaryPath = path.join(dataDir, `${COLLECTION.SUMMARY_PREFIX}_${stamp}${suffix}.json`);
      if (fs.existsSync(summaryPath)) {
        continue;
      }

      try {
        fs.writeFileSync(artifactPath, csv, { encoding: 'utf8', flag: 'wx' });
      } catch (err) {
        if (isFileExistsError(err)) {
          continue;
        }
        throw err;
      }

      const summaryContent = { ...summary, filename: path.basename(artifactPath) };
      try {
        fs.writeFileSync(summaryPath, JSON.stringify(summaryContent, null, 2), {
          encoding: 'utf8',
          flag: 'wx',
        });
      } catch (err) {
        // 汇总写入失败时移除已写入的 CSV，失败的运行不留下产物
        removeArtifact(artifactPath);
        throw err;
      }

      return { artifactPath, summaryPath };
    }

    throw new Error(`无法为 ${stamp} 生成唯一的产物文件名`);
  }

  function appendRunSummary(record: RunSummaryRecord): string {
    fs.mkdirSync(logDir, { recursive: true });
    const summaryLogPath = path.join(logDir, COLLECTION.RUN_SUMMARY_FILE);
    fs.appendFileSync(summaryLogPath, `${JSON.stringify(record)}\n`, 'utf8');
    return summaryLogPath;
  }

  return {
    writeSnapshotArtifacts,
    appendRunSummary,
  };
}
