/**
 * 采集触发模块
 *
 * 功能：
 * - 输出当前尼泊尔时间、星期与交易时段说明
 * - strict 模式：休市时跳过，开市时执行单次采集
 * - skip 模式（手动/开发运行）：不检查交易时段直接采集
 *
 * 外部调度器每次触发运行一次，本模块不抛错。
 */
import { WEEKDAY_LABELS } from '../../constants/index.js';
import { formatError } from '../../utils/error/index.js';
import { getNepalClock, toNepalDateTime } from '../../utils/time/index.js';
import type { CollectionTickDeps, CollectionTickResult } from './types.js';

/**
 * 执行一次采集触发。
 *
 * @param deps 采集器、门禁模式、日志与时钟
 * @returns skipped（附交易时段说明）或 collected（附采集结果）
 */
export async function runCollectionTick(deps: CollectionTickDeps): Promise<CollectionTickResult> {
  const { collector, gateMode, logger, now } = deps;
  const current = now();
  const weekdayLabel = WEEKDAY_LABELS[getNepalClock(current).weekday];
  // 描述与门禁判定基于同一时刻
  const description = collector.describeSchedule(current);
  logger.info(`[采集触发] 尼泊尔时间 ${toNepalDateTime(current)} ${weekdayLabel}`);
  logger.info(`[采集触发] ${description}`);

  if (gateMode === 'skip') {
    logger.info('[采集触发] 开发模式跳过交易时段检查');
  } else if (!collector.isMarketOpen(current)) {
    logger.info('[采集触发] 当前休市，跳过采集');
    return { status: 'skipped', description };
  }

  try {
    const outcome = await collector.collectSingleRun();
    return { status: 'collected', outcome };
  } catch (err) {
    // collectSingleRun 按约定不抛错，此处兜底为传输失败
    const reason = formatError(err);
    logger.error(`[采集触发] 采集过程异常: ${reason}`);
    return {
      status: 'collected',
      outcome: { kind: 'failure', errorType: 'TransportError', reason },
    };
  }
}
