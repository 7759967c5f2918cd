/**
 * 用户词典持久化存储
 *
 * 职责:
 * - 读写 user_dict.json（UUID → 保存格式单词）
 * - 以专用的存储锁串行化读写，与编译锁相互独立
 * - 每次调用都重新读取磁盘，不缓存
 */

import path from 'path';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { Mutex } from '../core/mutex';
import { userDictLogger } from '../logger';
import { CorruptStoreError, UserDictError } from './errors';
import { isFileNotFound } from './fs-utils';
import { parseWordId } from './word-id';
import { fromSaveFormat, toSaveFormat } from './word-codec';
import type { SaveFormatWordRecord, UserDictionary } from './types';

const logger = userDictLogger.child({ component: 'store' });

const storedWordSchema = z
  .object({
    surface: z.string(),
    cost: z.number().int(),
    context_id: z.number().int().optional(),
    part_of_speech: z.string(),
    part_of_speech_detail_1: z.string(),
    part_of_speech_detail_2: z.string(),
    part_of_speech_detail_3: z.string(),
    inflectional_type: z.string(),
    inflectional_form: z.string(),
    stem: z.string(),
    yomi: z.string(),
    pronunciation: z.string(),
    accent_type: z.number().int(),
    mora_count: z.number().int().optional(),
    accent_associative_rule: z.string(),
  })
  .passthrough();

const storeFileSchema = z.record(z.string(), storedWordSchema);

const KNOWN_FIELDS: ReadonlySet<string> = new Set(Object.keys(storedWordSchema.shape));

/**
 * 读-改-写的变更结果
 */
export interface StoreMutation<T> {
  next: UserDictionary;
  result: T;
}

export class UserDictStore {
  private readonly mutex = new Mutex();

  constructor(private readonly storePath: string) {}

  get path(): string {
    return this.storePath;
  }

  /**
   * 读取整个用户词典；文件不存在时返回空词典
   */
  async readAll(): Promise<UserDictionary> {
    return this.mutex.runExclusive(() => this.readUnlocked());
  }

  /**
   * 整体覆盖写入用户词典
   */
  async writeAll(dict: UserDictionary): Promise<void> {
    await this.mutex.runExclusive(() => this.writeUnlocked(dict));
  }

  /**
   * 在一次持锁期间完成读-改-写
   *
   * mutator 抛错时不写入任何内容。
   */
  async update<T>(mutator: (current: UserDictionary) => StoreMutation<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const current = await this.readUnlocked();
      const { next, result } = mutator(current);
      await this.writeUnlocked(next);
      return result;
    });
  }

  // ==================== 内部实现（调用方须持有存储锁） ====================

  private async readUnlocked(): Promise<UserDictionary> {
    let raw: string;
    try {
      raw = await readFile(this.storePath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return {};
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CorruptStoreError(`用户词典文件不是有效的 JSON: ${this.storePath}`, {
        cause: error,
      });
    }

    const parsed = storeFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new CorruptStoreError(
        `用户词典文件格式错误: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim(),
        { cause: parsed.error },
      );
    }

    const result: UserDictionary = {};
    for (const [rawId, saved] of Object.entries(parsed.data)) {
      const wordId = parseWordId(rawId);
      if (wordId === null) {
        throw new CorruptStoreError(`用户词典中存在无效的单词 ID: ${rawId}`);
      }
      if (Object.hasOwn(result, wordId)) {
        throw new CorruptStoreError(`用户词典中存在重复的单词 ID: ${rawId}`);
      }

      const unknownFields = Object.keys(saved).filter((field) => !KNOWN_FIELDS.has(field));
      if (unknownFields.length > 0) {
        logger.warn({ wordId, unknownFields }, '用户词典条目包含未知字段，读取时将被丢弃');
      }

      try {
        result[wordId] = fromSaveFormat(saved);
      } catch (error) {
        if (error instanceof UserDictError) {
          throw new CorruptStoreError(`用户词典条目 ${wordId} 无效: ${error.message}`, {
            cause: error,
          });
        }
        throw error;
      }
    }

    return result;
  }

  private async writeUnlocked(dict: UserDictionary): Promise<void> {
    const saveFormat: Record<string, SaveFormatWordRecord> = {};
    for (const [wordId, word] of Object.entries(dict)) {
      saveFormat[wordId] = toSaveFormat(word);
    }

    await mkdir(path.dirname(this.storePath), { recursive: true });

    // 先写临时文件再原子替换，读者不会看到写了一半的文件
    const tmpPath = `${this.storePath}.${uuidv4()}.tmp`;
    try {
      await writeFile(tmpPath, `${JSON.stringify(saveFormat, null, 2)}\n`, 'utf-8');
      await rename(tmpPath, this.storePath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }

    logger.debug({ wordCount: Object.keys(dict).length }, '用户词典已写入');
  }
}
