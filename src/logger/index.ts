/**
 * 统一日志系统 - 基线配置
 *
 * 功能:
 * - 结构化 JSON 日志输出（生产环境）
 * - 美化控制台输出（开发环境）
 * - 支持子日志器创建
 * - 统一的日志级别控制
 */

import pino from 'pino';
import type { Logger, LoggerOptions, DestinationStream } from 'pino';

// ==================== 配置常量 ====================

/** 默认日志级别 */
const DEFAULT_LOG_LEVEL = 'info';

/** 应用名称 */
const APP_NAME = 'tts-user-dict-engine';

/** 需要脱敏的字段路径 */
const REDACT_PATHS = ['req.headers.authorization', 'req.headers.cookie', '*.token', '*.secret'];

// ==================== 环境检测 ====================

// 日志器先于 env.ts 加载（env.ts 自身依赖日志器），因此这里直接读取 process.env
const LOG_LEVEL = process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_PRODUCTION = NODE_ENV === 'production';
const IS_TEST = NODE_ENV === 'test';

// ==================== 序列化器 ====================

/**
 * 错误序列化器 - 保留完整堆栈与错误码
 */
function errSerializer(err: Error): pino.SerializedError {
  const serialized = pino.stdSerializers.err(err);

  if ('code' in err && typeof err.code === 'string') {
    serialized.code = err.code;
  }

  return serialized;
}

/** 序列化器集合 */
export const serializers = {
  req: pino.stdSerializers.req,
  res: pino.stdSerializers.res,
  err: errSerializer,
};

// ==================== 日志器配置 ====================

function buildLoggerOptions(): LoggerOptions {
  return {
    level: LOG_LEVEL,

    base: {
      app: APP_NAME,
      env: NODE_ENV,
    },

    serializers,

    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },

    formatters: {
      level(label: string) {
        return { level: label };
      },
      // 开发环境移除 pid/hostname 以减少噪音
      bindings(bindings) {
        if (IS_PRODUCTION) {
          return bindings;
        }
        return {
          ...bindings,
          pid: undefined,
          hostname: undefined,
        };
      },
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/**
 * 构建开发环境的美化传输
 */
function buildDevTransport(): DestinationStream | undefined {
  if (IS_PRODUCTION || IS_TEST) {
    return undefined;
  }

  try {
    return pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: false,
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    });
  } catch {
    // pino-pretty 不可用时回退到 JSON 输出
    console.warn('[Logger] pino-pretty not available, falling back to JSON output');
    return undefined;
  }
}

// ==================== 创建日志器实例 ====================

/** 基线日志器 */
export const logger: Logger = pino(buildLoggerOptions(), buildDevTransport());

// ==================== 子日志器工厂 ====================

/**
 * 子日志器绑定字段类型
 */
export interface LoggerBindings {
  /** 模块名称 */
  module?: string;
  /** 功能名称 */
  feature?: string;
  /** 其他自定义字段 */
  [key: string]: unknown;
}

/**
 * 创建子日志器
 *
 * @example
 * ```typescript
 * const storeLogger = createChildLogger({ module: 'user-dict-store' });
 * storeLogger.info({ wordCount: 3 }, '用户词典已写入');
 * ```
 */
export function createChildLogger(bindings: LoggerBindings = {}): Logger {
  return logger.child(bindings);
}

// ==================== 预置模块日志器 ====================

/** 启动流程日志器 */
export const startupLogger = createChildLogger({ module: 'startup' });

/** 服务层日志器 */
export const serviceLogger = createChildLogger({ module: 'service' });

/** 用户词典子系统日志器 */
export const userDictLogger = createChildLogger({ module: 'user-dict' });

export type { Logger } from 'pino';
