import type { CollectionTickResult } from './types.js';

/**
 * 生成采集触发结束时的状态行。
 */
export function formatTickResult(result: CollectionTickResult): string {
  if (result.status === 'skipped') {
    return '[完成] 休市，未采集';
  }
  const { outcome } = result;
  switch (outcome.kind) {
    case 'success':
      return `[完成] 采集成功: ${outcome.recordCount} 条记录 -> ${outcome.artifactPath}`;
    case 'marketClosed':
      return `[完成] 上游报告休市: ${outcome.detail}`;
    case 'failure':
      return `[完成] 采集失败 ${outcome.errorType}: ${outcome.reason}`;
  }
}
