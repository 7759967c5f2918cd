import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { resolveUserDictPaths } from '../config/paths';
import { serviceLogger } from '../logger';
import {
  ActiveDictionarySlot,
  CompilationPipeline,
  MecabDictIndexCompiler,
  NotFoundError,
  PART_OF_SPEECH_TABLE,
  UserDictStore,
  ValidationError,
  isWordRecord,
  parseWordId,
  toRecord,
  validateRecord,
} from '../user-dict';
import type {
  CompilationOutcome,
  ImportableWord,
  PartOfSpeechDetail,
  UserDictionary,
  WordProperty,
  WordRecord,
} from '../user-dict';

const logger = serviceLogger.child({ module: 'user-dict-service' });

/**
 * 规范化单词 ID（任意版本 UUID，转小写）
 */
function requireWordId(rawId: string): string {
  const wordId = parseWordId(rawId);
  if (wordId === null) {
    throw new ValidationError(`无效的单词 ID: ${rawId}`);
  }
  return wordId;
}

/**
 * UserDictService - 用户词典管理
 *
 * 每个变更操作：持存储锁完成读-改-写 → 释放 → 持编译锁重新编译。
 * 两步之间外部可能观察到"词典文件已更新、编译产物尚未更新"的窗口，属于可接受的最终一致。
 */
export class UserDictService {
  constructor(
    private readonly store: UserDictStore,
    private readonly pipeline: CompilationPipeline,
  ) {}

  /**
   * 启动时编译一次，使分析器加载已保存的用户词典
   */
  async initialize(): Promise<CompilationOutcome> {
    return this.pipeline.recompile();
  }

  /**
   * 获取全部单词
   */
  async listWords(): Promise<UserDictionary> {
    return this.store.readAll();
  }

  /**
   * 获取品詞参照表（用于展示可选的单词类别）
   */
  listPartOfSpeech(): readonly PartOfSpeechDetail[] {
    return PART_OF_SPEECH_TABLE;
  }

  /**
   * 添加单词，返回新分配的 UUID
   */
  async addWord(property: WordProperty): Promise<string> {
    const word = toRecord(property);

    const wordId = await this.store.update((current) => {
      let id = uuidv4();
      while (Object.hasOwn(current, id)) {
        id = uuidv4();
      }
      return { next: { ...current, [id]: word }, result: id };
    });

    logger.info({ wordId, surface: word.surface }, '单词已添加');
    await this.pipeline.recompile();
    return wordId;
  }

  /**
   * 覆盖更新指定单词，UUID 保持不变
   */
  async updateWord(rawId: string, property: WordProperty): Promise<void> {
    const wordId = requireWordId(rawId);
    const word = toRecord(property);

    await this.store.update((current) => {
      if (!Object.hasOwn(current, wordId)) {
        throw new NotFoundError(`UUID 对应的单词不存在: ${wordId}`);
      }
      return { next: { ...current, [wordId]: word }, result: undefined };
    });

    logger.info({ wordId, surface: word.surface }, '单词已更新');
    await this.pipeline.recompile();
  }

  /**
   * 删除指定单词
   */
  async deleteWord(rawId: string): Promise<void> {
    const wordId = requireWordId(rawId);
    await this.store.update((current) => {
      if (!Object.hasOwn(current, wordId)) {
        throw new NotFoundError(`UUID 对应的单词不存在: ${wordId}`);
      }
      const next = { ...current };
      delete next[wordId];
      return { next, result: undefined };
    });

    logger.info({ wordId }, '单词已删除');
    await this.pipeline.recompile();
  }

  /**
   * 批量导入单词
   *
   * 先校验全部条目，任何一条不合法则整体放弃、不写入。
   * UUID 冲突时 overwriteOnConflict 为 true 则以导入数据为准，否则保留现有单词。
   */
  async importWords(
    incoming: Record<string, ImportableWord>,
    overwriteOnConflict: boolean = false,
  ): Promise<void> {
    const validated: UserDictionary = {};
    for (const [rawId, word] of Object.entries(incoming)) {
      const wordId = requireWordId(rawId);
      if (Object.hasOwn(validated, wordId)) {
        throw new ValidationError(`导入数据中存在重复的单词 ID: ${rawId}`);
      }
      validated[wordId] = this.validateImportEntry(wordId, word);
    }

    await this.store.update((current) => ({
      next: overwriteOnConflict ? { ...current, ...validated } : { ...validated, ...current },
      result: undefined,
    }));

    logger.info(
      { importCount: Object.keys(validated).length, overwriteOnConflict },
      '用户词典已导入',
    );
    await this.pipeline.recompile();
  }

  private validateImportEntry(wordId: string, word: ImportableWord): WordRecord {
    try {
      return isWordRecord(word) ? validateRecord(word) : toRecord(word);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ValidationError(`导入条目 ${wordId} 无效: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}

// ==================== 默认实例 ====================

/** 进程级的生效词典槽位，供分析器绑定读取 */
export const activeDictionary = new ActiveDictionarySlot();

let defaultService: UserDictService | null = null;

/**
 * 按环境变量配置创建默认服务（单例）
 */
export function getUserDictService(): UserDictService {
  if (!defaultService) {
    const paths = resolveUserDictPaths(env);
    const store = new UserDictStore(paths.userDictPath);
    const pipeline = new CompilationPipeline({
      baseLexiconDir: paths.baseLexiconDir,
      compiledDictPath: paths.compiledDictPath,
      store,
      compiler: new MecabDictIndexCompiler({
        binaryPath: env.MECAB_DICT_INDEX_PATH,
        systemDictDir: paths.systemDictDir,
      }),
      activeDictionary,
    });
    defaultService = new UserDictService(store, pipeline);
  }
  return defaultService;
}
