import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger';
import { UserDictError } from '../user-dict';
import type { UserDictErrorCode } from '../user-dict';

/**
 * 结构化应用错误类
 * 用于区分可预期的业务错误和系统错误，避免泄露内部实现细节
 */
export class AppError extends Error {
  statusCode: number;
  code: string;
  isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = 'BAD_REQUEST',
    isOperational: boolean = true,
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static notFound(message: string = '资源不存在'): AppError {
    return new AppError(message, 404, 'NOT_FOUND');
  }

  static badRequest(message: string = '请求参数错误'): AppError {
    return new AppError(message, 400, 'BAD_REQUEST');
  }

  static internal(message: string = '服务器内部错误'): AppError {
    return new AppError(message, 500, 'INTERNAL_ERROR', false);
  }
}

/**
 * 用户词典错误 → HTTP 状态码
 * 存储损坏与编译失败属于系统错误，不向客户端暴露细节
 */
const USER_DICT_ERROR_STATUS: Record<UserDictErrorCode, { statusCode: number; isOperational: boolean }> = {
  VALIDATION_ERROR: { statusCode: 422, isOperational: true },
  NOT_FOUND: { statusCode: 404, isOperational: true },
  CORRUPT_STORE: { statusCode: 500, isOperational: false },
  COMPILATION_FAILED: { statusCode: 500, isOperational: false },
};

export function toAppError(err: UserDictError): AppError {
  const { statusCode, isOperational } = USER_DICT_ERROR_STATUS[err.code];
  return new AppError(err.message, statusCode, err.code, isOperational);
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction,
) {
  // 优先使用 req.log（pino-http 注入的带上下文日志器），fallback 到全局 logger
  const log = req.log ?? logger;
  const logContext = {
    err,
    method: req.method,
    path: req.path,
  };

  if (err instanceof ZodError) {
    log.warn(logContext, `参数验证错误: ${err.errors[0]?.message}`);
    return res.status(400).json({
      success: false,
      error: err.errors[0]?.message || '请求参数不合法',
      code: 'BAD_REQUEST',
    });
  }

  const appError = err instanceof UserDictError ? toAppError(err) : err;

  if (appError instanceof AppError) {
    if (appError.isOperational) {
      log.warn(logContext, `业务错误: ${appError.message}`);
    } else {
      log.error(logContext, `系统错误: ${appError.message}`);
    }
    return res.status(appError.statusCode).json({
      success: false,
      error: appError.isOperational ? appError.message : '服务器内部错误',
      code: appError.code,
    });
  }

  // 未知错误 - 统一返回 500，不泄露内部实现细节
  log.error(logContext, `未处理错误: ${err.message}`);
  return res.status(500).json({
    success: false,
    error: '服务器内部错误',
    code: 'INTERNAL_ERROR',
  });
}

/**
 * 未匹配路由
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(AppError.notFound(`路由不存在: ${req.method} ${req.path}`));
}
