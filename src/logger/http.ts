/**
 * HTTP 请求日志中间件
 *
 * 功能:
 * - 为每个请求分配唯一 requestId
 * - 记录请求/响应元数据
 * - 健康检查路径静默处理
 * - 根据状态码自动选择日志级别
 */

import type { RequestHandler } from 'express';
import type { IncomingMessage, ServerResponse } from 'http';
import pinoHttp from 'pino-http';
import type { HttpLogger, Options } from 'pino-http';
import type { LevelWithSilent } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { logger, serializers } from './index';

/** 不记录日志的路径 */
const SILENT_PATHS = ['/health', '/favicon.ico'];

function shouldSilence(path: string): boolean {
  return SILENT_PATHS.includes(path);
}

/**
 * 根据响应状态码确定日志级别
 */
function determineLogLevel(
  _req: IncomingMessage,
  res: ServerResponse,
  err?: Error,
): LevelWithSilent {
  if (err || res.statusCode >= 500) {
    return 'error';
  }
  if (res.statusCode >= 400) {
    return 'warn';
  }
  return 'info';
}

/**
 * 生成或提取请求 ID
 * 优先使用上游传递的 X-Request-ID
 */
function generateRequestId(req: IncomingMessage): string {
  const existingId = req.headers['x-request-id'];
  if (typeof existingId === 'string' && existingId.length > 0) {
    return existingId;
  }
  return uuidv4();
}

function buildHttpLoggerOptions(): Options {
  return {
    logger,
    serializers,
    genReqId: (req) => req.id ?? generateRequestId(req),
    autoLogging: {
      ignore: (req) => shouldSilence(req.url || ''),
    },
    customLogLevel: determineLogLevel,
    customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
    customErrorMessage: (req, res, err) =>
      `${req.method} ${req.url} ${res.statusCode} - ${err.message}`,
  };
}

// ==================== 导出中间件 ====================

let httpLoggerInstance: HttpLogger | null = null;

/**
 * 获取 HTTP 日志中间件（单例）
 */
export function getHttpLogger(): HttpLogger {
  if (!httpLoggerInstance) {
    httpLoggerInstance = pinoHttp(buildHttpLoggerOptions());
  }
  return httpLoggerInstance;
}

/**
 * 请求 ID 注入中间件
 * 在 pino-http 之前运行，并回写到响应头方便客户端追踪
 */
export const requestIdMiddleware: RequestHandler = (req, res, next) => {
  const requestId = generateRequestId(req);
  req.id = requestId;
  res.setHeader('X-Request-ID', requestId);
  next();
};

/**
 * 组合的日志中间件：requestId 注入 + HTTP 日志记录
 */
export const httpLoggerMiddleware: RequestHandler = (req, res, next) => {
  requestIdMiddleware(req, res, (err?: unknown) => {
    if (err) {
      next(err);
      return;
    }
    getHttpLogger()(req, res, next);
  });
};
