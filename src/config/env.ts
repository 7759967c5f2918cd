/**
 * 环境变量配置
 *
 * 使用 Zod 进行运行时验证，确保环境变量的类型安全和完整性
 * 所有环境变量都通过此文件统一访问，避免直接使用 process.env
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { startupLogger } from '../logger';

config();

export const envSchema = z.object({
  // ============================================
  // 服务器配置
  // ============================================
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  PORT: z
    .string()
    .default('10101')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive().max(65535, 'PORT 必须在 1-65535 范围内')),

  CORS_ORIGIN: z.string().default('*'),

  // ============================================
  // 日志配置
  // ============================================
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),

  // ============================================
  // 用户词典配置
  // ============================================
  /** 用户词典与编译产物的保存目录 */
  USER_DICT_DATA_DIR: z.string().min(1).default('data'),

  /** 内置资源目录（其下 dictionaries/ 存放基础词典 *.csv.zst） */
  USER_DICT_RESOURCE_DIR: z.string().min(1).default('resources'),

  // ============================================
  // 词典编译器配置
  // ============================================
  MECAB_DICT_INDEX_PATH: z.string().min(1).default('mecab-dict-index'),

  /** 系统词典目录，未设置时使用 <USER_DICT_RESOURCE_DIR>/open_jtalk_dic */
  MECAB_SYSTEM_DICT_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * 验证并解析环境变量
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    const parsed = envSchema.parse({
      NODE_ENV: source.NODE_ENV,
      PORT: source.PORT,
      CORS_ORIGIN: source.CORS_ORIGIN,
      LOG_LEVEL: source.LOG_LEVEL,
      USER_DICT_DATA_DIR: source.USER_DICT_DATA_DIR,
      USER_DICT_RESOURCE_DIR: source.USER_DICT_RESOURCE_DIR,
      MECAB_DICT_INDEX_PATH: source.MECAB_DICT_INDEX_PATH,
      MECAB_SYSTEM_DICT_DIR: source.MECAB_SYSTEM_DICT_DIR,
    });

    if (parsed.NODE_ENV === 'production' && parsed.CORS_ORIGIN === '*') {
      startupLogger.warn('⚠️ 生产环境 CORS_ORIGIN 为 *，请确认是否为预期配置');
    }

    return parsed;
  } catch (error) {
    if (error instanceof z.ZodError) {
      startupLogger.error('环境变量验证失败:');
      error.errors.forEach((err) => {
        startupLogger.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      throw new Error('环境变量配置错误，请检查 .env 文件');
    }
    throw error;
  }
}

/**
 * 导出验证后的环境变量
 *
 * @example
 * ```ts
 * import { env } from './config/env';
 *
 * console.log(`Server running on port ${env.PORT}`);
 * ```
 */
export const env = parseEnv();
