export type UserDictErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CORRUPT_STORE'
  | 'COMPILATION_FAILED';

/**
 * 用户词典子系统错误基类
 * code 供 HTTP 层映射为协议级错误响应
 */
export class UserDictError extends Error {
  readonly code: UserDictErrorCode;

  constructor(message: string, code: UserDictErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** 单词属性不合法：品词组合、アクセント結合規則、优先级、发音等 */
export class ValidationError extends UserDictError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'VALIDATION_ERROR', options);
  }
}

/** 指定的单词 ID 不存在 */
export class NotFoundError extends UserDictError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
  }
}

/** 用户词典文件无法解析，不做自动修复 */
export class CorruptStoreError extends UserDictError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CORRUPT_STORE', options);
  }
}

/** 外部编译器失败或未产出词典文件 */
export class CompilationError extends UserDictError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'COMPILATION_FAILED', options);
  }
}
