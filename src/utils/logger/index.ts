/**
 * 日志系统模块
 *
 * 功能：
 * - 基于 pino 的日志系统
 * - 双流输出：同时输出到控制台和文件
 * - 按尼泊尔日期命名日志文件（追加写入）
 * - 支持 DEBUG/INFO/WARN/ERROR 级别
 *
 * 日志目录：
 * - <logDir>/system/：系统日志（所有级别）
 * - <logDir>/debug/：调试日志（仅 DEBUG 级别，需设置 DEBUG=true）
 *
 * 特性：
 * - 控制台输出带颜色高亮，WARN/ERROR 输出到 stderr
 * - 文件输出纯文本格式
 * - 日志目录无法创建时退化为仅控制台输出
 */

import pino from 'pino';
import fs from 'node:fs';
import path from 'node:path';
import { Writable } from 'node:stream';
import { inspect } from 'node:util';
import { LOG_LEVELS, LOGGING } from '../../constants/index.js';
import { isRecord, toNepalTimeLog } from '../primitives/index.js';
import type { FlushableLogger, LogObject, LoggerOptions } from './types.js';

// ANSI 颜色代码
const colors = {
  reset: '\x1b[0m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
  green: '\x1b[32m',
  cyan: '\x1b[96m',
} as const;

const LEVEL_NAMES: Readonly<Record<number, string>> = {
  [LOG_LEVELS.DEBUG]: 'DEBUG',
  [LOG_LEVELS.INFO]: 'INFO',
  [LOG_LEVELS.WARN]: 'WARN',
  [LOG_LEVELS.ERROR]: 'ERROR',
};

const LEVEL_COLORS: Readonly<Record<number, string>> = {
  [LOG_LEVELS.DEBUG]: colors.gray,
  [LOG_LEVELS.WARN]: colors.yellow,
  [LOG_LEVELS.ERROR]: colors.red,
};

const formatExtra = (extra: unknown): string => {
  return inspect(extra, { depth: 5, maxArrayLength: 100 });
};

/**
 * ANSI 转义字符（ESC，ASCII 27）
 * 使用 String.fromCodePoint 避免在正则表达式中直接使用控制字符
 */
const ANSI_ESC = String.fromCodePoint(27);

const ANSI_CODE_REGEX = new RegExp(ANSI_ESC + String.raw`\[[0-9;]*m`, 'g');

/**
 * 移除 ANSI 颜色代码
 */
function stripAnsiCodes(str: string): string {
  return str.replaceAll(ANSI_CODE_REGEX, '');
}

function isLogLevel(value: unknown): value is LogObject['level'] {
  return (
    value === LOG_LEVELS.DEBUG ||
    value === LOG_LEVELS.INFO ||
    value === LOG_LEVELS.WARN ||
    value === LOG_LEVELS.ERROR
  );
}

/**
 * 将 pino 输出的 JSON 行解析为日志对象，无法识别时返回 null。
 */
function parseLogObject(chunk: Buffer | string): LogObject | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(chunk.toString());
  } catch {
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }
  const level = parsed['level'];
  const time = parsed['time'];
  const msg = parsed['msg'];
  if (!isLogLevel(level) || typeof time !== 'number') {
    return null;
  }
  return { level, time, msg: typeof msg === 'string' ? msg : String(msg), extra: parsed['extra'] };
}

function appendExtra(line: string, extra: unknown, strip: boolean): string {
  if (extra === undefined || extra === null) {
    return line;
  }
  let text: string;
  if (typeof extra === 'object') {
    try {
      text = JSON.stringify(extra);
    } catch {
      text = formatExtra(extra);
    }
  } else {
    text = formatExtra(extra);
  }
  return `${line} ${strip ? stripAnsiCodes(text) : text}`;
}

/**
 * 自定义格式化函数（用于文件输出）
 */
export function formatForFile(obj: LogObject): string {
  const levelStr = `[${LEVEL_NAMES[obj.level] ?? 'INFO'}]`;
  const timestamp = toNepalTimeLog(new Date(obj.time));
  const line = `${levelStr} ${timestamp} ${stripAnsiCodes(obj.msg)}`;
  return appendExtra(line, obj.extra, true) + '\n';
}

/**
 * 自定义格式化函数（用于控制台输出，带颜色）
 */
function formatForConsole(obj: LogObject): string {
  const levelStr = `[${LEVEL_NAMES[obj.level] ?? 'INFO'}]`;
  const timestamp = toNepalTimeLog(new Date(obj.time));
  const color = LEVEL_COLORS[obj.level] ?? '';
  const reset = color ? colors.reset : '';
  const line = `${color}${levelStr} ${timestamp} ${obj.msg}${reset}`;
  return appendExtra(line, obj.extra, false) + '\n';
}

/**
 * 带超时保护的写入辅助函数
 * drain 事件超时未触发时仍调用 callback，避免阻塞日志系统
 */
function writeWithDrainTimeout(
  stream: NodeJS.WriteStream,
  data: string,
  timeout: number,
  callback: () => void,
): void {
  if (stream.write(data)) {
    callback();
    return;
  }
  let resolved = false;
  const onDrain = (): void => {
    if (resolved) return;
    resolved = true;
    clearTimeout(timeoutId);
    callback();
  };
  const timeoutId = setTimeout(() => {
    if (resolved) return;
    resolved = true;
    stream.removeListener('drain', onDrain);
    callback();
  }, timeout);
  stream.once('drain', onDrain);
}

/**
 * 创建控制台流（ERROR/WARN 输出到 stderr，其他输出到 stdout）
 */
function createConsoleStream(): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
      const obj = parseLogObject(chunk);
      if (!obj) {
        callback();
        return;
      }
      const target = obj.level >= LOG_LEVELS.WARN ? process.stderr : process.stdout;
      writeWithDrainTimeout(target, formatForConsole(obj), LOGGING.CONSOLE_DRAIN_TIMEOUT_MS, callback);
    },
  });
}

/**
 * 创建文件流（追加写入 <logDir>/<subDir>/<YYYY-MM-DD>.log）
 * 日志目录无法创建时在控制台提示并返回 null，日志仅输出到控制台。
 * @param filePath 日志文件路径
 * @param accept 过滤条件，返回 false 的日志不写入该文件
 */
function createFileStream(filePath: string, accept: (obj: LogObject) => boolean): Writable | null {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  } catch (err) {
    console.error(`[Logger] 无法创建日志目录，仅输出到控制台 (${path.dirname(filePath)}):`, err);
    return null;
  }
  const target = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  target.on('error', (err) => {
    console.error(`[Logger] 文件流错误 (${filePath}):`, err);
  });

  return new Writable({
    write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
      const obj = parseLogObject(chunk);
      if (!obj || !accept(obj)) {
        callback();
        return;
      }
      target.write(formatForFile(obj), (err) => {
        if (err) {
          console.error(`[Logger] 日志写入失败 (${filePath}):`, err);
        }
        callback();
      });
    },
    final(callback: (error?: Error | null) => void): void {
      target.end(() => callback());
    },
  });
}

function endStream(stream: Writable): Promise<void> {
  return new Promise((resolve) => {
    stream.end(() => resolve());
  });
}

/**
 * 创建日志记录器。
 * 文件名使用创建时刻的尼泊尔日期；每次运行为独立进程，运行期间不做日期切换。
 *
 * @param options 日志目录、DEBUG 开关、可选时钟
 * @returns 带 flush 的日志记录器
 */
export function createLogger(options: LoggerOptions): FlushableLogger {
  const { logDir, debug } = options;
  const now = options.now ?? (() => new Date());
  const dateKey = toNepalTimeLog(now()).slice(0, 10);
  const level: pino.Level = debug ? 'debug' : 'info';

  const consoleStream = createConsoleStream();
  const systemFileStream = createFileStream(
    path.join(logDir, LOGGING.SYSTEM_SUBDIR, `${dateKey}.log`),
    () => true,
  );
  const debugFileStream = debug
    ? createFileStream(
        path.join(logDir, LOGGING.DEBUG_SUBDIR, `${dateKey}.log`),
        (obj) => obj.level === LOG_LEVELS.DEBUG,
      )
    : null;

  const fileStreams = [systemFileStream, debugFileStream].filter(
    (stream): stream is Writable => stream !== null,
  );
  const streams: pino.StreamEntry[] = [
    { level, stream: consoleStream },
    ...fileStreams.map((stream) => ({ level, stream })),
  ];

  const pinoLogger = pino(
    {
      level,
      customLevels: {
        debug: LOG_LEVELS.DEBUG,
        info: LOG_LEVELS.INFO,
        warn: LOG_LEVELS.WARN,
        error: LOG_LEVELS.ERROR,
      },
      useOnlyCustomLevels: true,
    },
    pino.multistream(streams),
  );

  return {
    debug(msg: string, extra?: unknown): void {
      if (!debug) {
        return;
      }
      if (extra == null) {
        pinoLogger.debug(msg);
      } else {
        pinoLogger.debug({ extra }, msg);
      }
    },

    info(msg: string, extra?: unknown): void {
      if (extra == null) {
        pinoLogger.info(msg);
      } else {
        pinoLogger.info({ extra }, msg);
      }
    },

    warn(msg: string, extra?: unknown): void {
      if (extra == null) {
        pinoLogger.warn(msg);
      } else {
        pinoLogger.warn({ extra }, msg);
      }
    },

    error(msg: string, extra?: unknown): void {
      if (extra == null) {
        pinoLogger.error(msg);
      } else {
        pinoLogger.error({ extra }, msg);
      }
    },

    async flush(): Promise<void> {
      for (const stream of fileStreams) {
        await endStream(stream);
      }
    },
  };
}
