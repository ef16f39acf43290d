/**
 * NEPSE 行情快照采集程序 - 主入口模块
 *
 * 由外部调度器（如 GitHub Actions cron）每次触发运行一次：
 * 1. 加载 .env.local 并校验配置，配置无效时退出码为 1
 * 2. 组装交易日历、NepseAPI 数据源、产物存储与采集器
 * 3. 执行一次采集触发，输出状态行
 * 4. 刷新日志后以退出码 0 结束（采集失败只报告，不视为进程错误）
 */
import dotenv from 'dotenv';
import { createConfig } from './config/config.index.js';
import { isConfigValidationError, validateAllConfig } from './config/config.validator.js';
import { NEPSE_ENDPOINTS } from './constants/index.js';
import { createCollector } from './core/collector/index.js';
import { createSessionCalendar } from './core/sessionCalendar/index.js';
import { runCollectionTick } from './main/collectionTick/index.js';
import { formatTickResult } from './main/collectionTick/utils.js';
import { createArtifactStore } from './services/artifactStore/index.js';
import { createNepseApiDataSource, createNepseHttpClient } from './services/nepseApi/index.js';
import { formatError } from './utils/error/index.js';
import { createLogger } from './utils/logger/index.js';
import type { CollectorConfig } from './types/config.js';

dotenv.config({ path: '.env.local' });

async function main(): Promise<number> {
  const env = process.env;
  // 日志目录与 DEBUG 先按宽松解析取值，以便记录校验错误
  const draft = createConfig({ env });
  const logger = createLogger({ logDir: draft.logDir, debug: draft.debug });

  let config: CollectorConfig;
  try {
    config = validateAllConfig({ env, logger });
  } catch (err) {
    if (isConfigValidationError(err)) {
      logger.error('程序启动失败：配置验证未通过');
    } else {
      logger.error('配置验证过程中发生错误', formatError(err));
    }
    await logger.flush();
    return 1;
  }

  const now = (): Date => new Date();
  const calendar = createSessionCalendar(config.calendar);
  const dataSource = createNepseApiDataSource({
    httpClient: createNepseHttpClient({
      baseUrl: config.apiBaseUrl,
      timeoutMs: config.requestTimeoutMs,
    }),
    probeTimeoutMs: config.probeTimeoutMs,
    endpoints: NEPSE_ENDPOINTS,
    logger,
  });
  const artifactStore = createArtifactStore({
    dataDir: config.dataDir,
    logDir: config.logDir,
    logger,
  });
  const collector = createCollector({
    now,
    calendar,
    dataSource,
    artifactStore,
    logger,
    runLabel: config.runLabel,
  });

  const result = await runCollectionTick({ collector, gateMode: config.gateMode, logger, now });
  logger.info(formatTickResult(result));
  await logger.flush();
  return 0;
}

try {
  process.exit(await main());
} catch (err: unknown) {
  console.error('程序异常退出', formatError(err));
  process.exit(1);
}
