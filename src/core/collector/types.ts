import type { ArtifactStore } from '../../services/artifactStore/types.js';
import type { CollectionOutcome } from '../../types/collection.js';
import type { DataSource, MarketSnapshot } from '../../types/dataSource.js';
import type { SessionCalendar } from '../../types/session.js';
import type { Logger } from '../../utils/logger/types.js';

/**
 * 采集器的依赖注入对象（创建 Collector 时的参数）。
 * 类型用途：createCollector() 的入参，提供时钟、交易日历、数据源、产物存储、日志与运行标识。
 * 数据来源：由入口组装；测试中注入替身。
 * 使用范围：仅采集器与测试使用。
 */
export type CollectorDeps = {
  readonly now: () => Date;
  readonly calendar: SessionCalendar;
  readonly dataSource: DataSource;
  readonly artifactStore: ArtifactStore;
  readonly logger: Logger;
  readonly runLabel: string;
};

/**
 * 采集器接口（行为契约）。
 * isMarketOpen / describeSchedule 默认使用注入时钟的当前时间，传入 at 时按该时刻判断；
 * collectSingleRun 执行一次采集且不抛错。
 */
export interface Collector {
  isMarketOpen(at?: Date): boolean;
  describeSchedule(at?: Date): string;
  collectSingleRun(): Promise<CollectionOutcome>;
}

/**
 * buildSnapshotRows 的入参。
 */
export type BuildRowsParams = {
  readonly snapshot: MarketSnapshot;
  readonly timestamp: Date;
  readonly marketOpen: boolean;
  readonly runLabel: string;
};
