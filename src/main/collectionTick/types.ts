import type { Collector } from '../../core/collector/types.js';
import type { CollectionOutcome } from '../../types/collection.js';
import type { GateMode } from '../../types/config.js';
import type { Logger } from '../../utils/logger/types.js';

/**
 * 采集触发的依赖注入对象。
 * 类型用途：runCollectionTick() 的入参。
 * 数据来源：入口组装；测试中注入采集器替身。
 * 使用范围：仅 collectionTick 模块与测试使用。
 */
export type CollectionTickDeps = {
  readonly collector: Collector;
  readonly gateMode: GateMode;
  readonly logger: Logger;
  readonly now: () => Date;
};

/**
 * 采集触发结果：skipped 表示休市未采集，collected 附带采集结果。
 */
export type CollectionTickResult =
  | { readonly status: 'skipped'; readonly description: string }
  | { readonly status: 'collected'; readonly outcome: CollectionOutcome };
