/**
 * logger 业务测试
 *
 * 功能：
 * - 验证文件行格式（级别、尼泊尔时间、附加数据）
 * - 验证系统日志与调试日志的写入范围
 */
import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { createLogger, formatForFile } from '../../src/utils/logger/index.js';
import { LOG_LEVELS } from '../../src/constants/index.js';
import { createTempDir, fixedClock, removeDir } from '../helpers/testDoubles.js';

let tempDir = '';

beforeEach(() => {
  tempDir = createTempDir('nepse-logger-');
});

afterEach(() => {
  removeDir(tempDir);
});

describe('formatForFile', () => {
  it('输出级别、尼泊尔时间与消息', () => {
    const line = formatForFile({
      level: LOG_LEVELS.WARN,
      time: Date.parse('2026-10-15T05:15:00.000Z'),
      msg: '[NepseAPI] 探测返回状态 503',
    });
    assert.equal(line, '[WARN] 2026-10-15 11:00:00.000 [NepseAPI] 探测返回状态 503\n');
  });

  it('附加数据以 JSON 追加', () => {
    const line = formatForFile({
      level: LOG_LEVELS.INFO,
      time: Date.parse('2026-10-15T05:15:00.000Z'),
      msg: '[采集] 成功',
      extra: { recordCount: 3 },
    });
    assert.equal(line, '[INFO] 2026-10-15 11:00:00.000 [采集] 成功 {"recordCount":3}\n');
  });
});

describe('createLogger', () => {
  it('非 DEBUG 模式只写系统日志且忽略 debug', async () => {
    const logger = createLogger({ logDir: tempDir, debug: false, now: fixedClock('2026-10-15T06:15:00.000Z') });
    logger.debug('调试信息');
    logger.info('采集开始');
    logger.error('采集失败', { errorType: 'TransportError' });
    await logger.flush();

    const content = fs.readFileSync(path.join(tempDir, 'system', '2026-10-15.log'), 'utf8');
    const lines = content.split('\n').filter((line) => line.length > 0);
    assert.equal(lines.length, 2);
    assert.match(lines[0] ?? '', /^\[INFO\] \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3} 采集开始$/);
    assert.match(lines[1] ?? '', /^\[ERROR\] .+ 采集失败 \{"errorType":"TransportError"\}$/);
    assert.equal(fs.existsSync(path.join(tempDir, 'debug')), false);
  });

  it('DEBUG 模式额外写入调试日志', async () => {
    const logger = createLogger({ logDir: tempDir, debug: true, now: fixedClock('2026-10-15T06:15:00.000Z') });
    logger.debug('请求 summary');
    logger.info('采集开始');
    await logger.flush();

    const debugLines = fs
      .readFileSync(path.join(tempDir, 'debug', '2026-10-15.log'), 'utf8')
      .split('\n')
      .filter((line) => line.length > 0);
    assert.equal(debugLines.length, 1);
    assert.match(debugLines[0] ?? '', /^\[DEBUG\] .+ 请求 summary$/);

    const systemLines = fs
      .readFileSync(path.join(tempDir, 'system', '2026-10-15.log'), 'utf8')
      .split('\n')
      .filter((line) => line.length > 0);
    assert.equal(systemLines.length, 2);
  });

  it('日志目录不可用时退化为仅控制台输出', async () => {
    const blocked = path.join(tempDir, 'logs-file');
    fs.writeFileSync(blocked, 'occupied');
    const logger = createLogger({ logDir: blocked, debug: true, now: fixedClock('2026-10-15T06:15:00.000Z') });
    logger.info('采集开始');
    logger.debug('请求 summary');
    await logger.flush();
    assert.equal(fs.readFileSync(blocked, 'utf8'), 'occupied');
  });
});
