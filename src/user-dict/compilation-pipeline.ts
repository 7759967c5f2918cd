/**
 * 词典编译流水线
 *
 * 流程（持编译锁）:
 *   idle → staging_source → compiling → swapping → idle
 *   任一步骤失败 → failed → idle，之前生效的词典保持不变
 *
 * 锁顺序：编译锁内部会短暂获取存储锁读取快照，反之不成立。
 */

import path from 'path';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { Mutex } from '../core/mutex';
import { userDictLogger } from '../logger';
import type { ActiveDictionaryHandle } from './active-dictionary';
import { listBaseLexiconFiles, readBaseLexicon } from './base-lexicon';
import type { DictionaryCompiler } from './dictionary-compiler';
import { CompilationError, UserDictError } from './errors';
import { isFile } from './fs-utils';
import type { UserDictionary, WordRecord } from './types';
import { costFromPriority } from './word-codec';

const logger = userDictLogger.child({ component: 'compilation' });

export type CompilationState = 'idle' | 'staging_source' | 'compiling' | 'swapping' | 'failed';

export type CompilationOutcome = 'compiled' | 'skipped' | 'no_base_lexicon';

/**
 * 流水线只需要读取用户词典快照
 */
export interface UserDictSnapshotSource {
  readAll(): Promise<UserDictionary>;
}

export interface CompilationPipelineOptions {
  baseLexiconDir: string;
  compiledDictPath: string;
  store: UserDictSnapshotSource;
  compiler: DictionaryCompiler;
  activeDictionary: ActiveDictionaryHandle;
  /** 为 true 时 recompile() 直接返回，默认由 isCompilationUnsupported() 决定 */
  skipCompilation?: boolean;
}

/**
 * 测试环境下的 Windows 上词典重新加载会使分析器初始化失败，此时跳过编译
 */
export function isCompilationUnsupported(
  nodeEnv: string | undefined = process.env.NODE_ENV,
  platform: NodeJS.Platform = process.platform,
): boolean {
  return nodeEnv === 'test' && platform === 'win32';
}

/**
 * 单词 → 编译器 CSV 行
 */
export function formatSourceLine(word: WordRecord): string {
  return (
    [
      word.surface,
      word.contextId,
      word.contextId,
      costFromPriority(word.contextId, word.priority),
      word.partOfSpeech,
      word.partOfSpeechDetail1,
      word.partOfSpeechDetail2,
      word.partOfSpeechDetail3,
      word.inflectionalType,
      word.inflectionalForm,
      word.stem,
      word.yomi,
      word.pronunciation,
      `${word.accentType}/${word.moraCount}`,
      word.accentAssociativeRule,
    ].join(',') + '\n'
  );
}

/**
 * 在路径的扩展名处替换为 suffix（user.dic → user.dict_csv-<id>.tmp）
 */
function withSuffix(filePath: string, suffix: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${suffix}`);
}

export class CompilationPipeline {
  private readonly mutex = new Mutex();
  private readonly skipCompilation: boolean;
  private state: CompilationState = 'idle';

  constructor(private readonly options: CompilationPipelineOptions) {
    this.skipCompilation = options.skipCompilation ?? isCompilationUnsupported();
  }

  getState(): CompilationState {
    return this.state;
  }

  get compiledDictPath(): string {
    return this.options.compiledDictPath;
  }

  /**
   * 重新生成编译词典并切换到分析器
   */
  async recompile(): Promise<CompilationOutcome> {
    return this.mutex.runExclusive(() => this.run());
  }

  private async run(): Promise<CompilationOutcome> {
    if (this.skipCompilation) {
      logger.info('当前环境不支持词典重新加载，跳过编译');
      return 'skipped';
    }

    const { baseLexiconDir, compiledDictPath, store, compiler, activeDictionary } = this.options;
    const runId = uuidv4();
    const tmpSourcePath = withSuffix(compiledDictPath, `.dict_csv-${runId}.tmp`);
    const tmpCompiledPath = withSuffix(compiledDictPath, `.dict_compiled-${runId}.tmp`);
    const previous = activeDictionary.current();
    let detached = false;

    try {
      this.state = 'staging_source';

      const files = await listBaseLexiconFiles(baseLexiconDir);
      if (files.length === 0) {
        // TODO: 基础词典缺失时分析器几乎不可用，确认是否应改为硬失败
        logger.warn({ baseLexiconDir }, '未找到基础词典，跳过编译');
        return 'no_base_lexicon';
      }

      let source = await readBaseLexicon(files);
      const userDict = await store.readAll();
      for (const word of Object.values(userDict)) {
        source += formatSourceLine(word);
      }

      await mkdir(path.dirname(compiledDictPath), { recursive: true });
      await writeFile(tmpSourcePath, source, 'utf-8');

      this.state = 'compiling';
      try {
        await compiler.compile(tmpSourcePath, tmpCompiledPath);
      } catch (error) {
        if (error instanceof UserDictError) {
          throw error;
        }
        throw new CompilationError('词典编译失败', { cause: error });
      }
      if (!(await isFile(tmpCompiledPath))) {
        throw new CompilationError('词典编译器未生成输出文件');
      }

      this.state = 'swapping';
      activeDictionary.clear();
      detached = true;
      await rename(tmpCompiledPath, compiledDictPath);
      if (await isFile(compiledDictPath)) {
        activeDictionary.set(path.resolve(compiledDictPath));
      }

      logger.info(
        { baseFiles: files.length, userWords: Object.keys(userDict).length },
        '用户词典已编译并生效',
      );
      return 'compiled';
    } catch (error) {
      this.state = 'failed';
      // 已卸载但新词典未注册时，恢复之前仍然存在的词典
      if (detached && previous !== null && activeDictionary.current() === null) {
        try {
          if (await isFile(previous)) {
            activeDictionary.set(previous);
          }
        } catch (restoreError) {
          logger.error({ err: restoreError, previous }, '恢复之前的词典失败');
        }
      }
      logger.error({ err: error }, '词典更新失败');
      throw error;
    } finally {
      await rm(tmpSourcePath, { force: true });
      await rm(tmpCompiledPath, { force: true });
      this.state = 'idle';
    }
  }
}
