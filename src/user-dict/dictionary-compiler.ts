/**
 * 外部词典编译器边界
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { userDictLogger } from '../logger';
import { CompilationError } from './errors';

const execFileAsync = promisify(execFile);

const logger = userDictLogger.child({ component: 'compiler' });

/**
 * 将 CSV 源文件编译为分析器使用的二进制词典
 * 失败时抛出错误；是否真正产出文件由调用方检查
 */
export interface DictionaryCompiler {
  compile(sourcePath: string, outputPath: string): Promise<void>;
}

export interface MecabDictIndexOptions {
  /** mecab-dict-index 可执行文件路径 */
  binaryPath: string;
  /** 系统词典目录（含 matrix.def / char.def 等） */
  systemDictDir: string;
  charset?: string;
}

/**
 * 调用 mecab-dict-index 生成用户词典
 */
export class MecabDictIndexCompiler implements DictionaryCompiler {
  private readonly charset: string;

  constructor(private readonly options: MecabDictIndexOptions) {
    this.charset = options.charset ?? 'utf-8';
  }

  async compile(sourcePath: string, outputPath: string): Promise<void> {
    const args = [
      '-d',
      this.options.systemDictDir,
      '-u',
      outputPath,
      '-f',
      this.charset,
      '-t',
      this.charset,
      sourcePath,
    ];

    try {
      const { stderr } = await execFileAsync(this.options.binaryPath, args);
      if (stderr) {
        logger.debug({ stderr }, 'mecab-dict-index 输出');
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CompilationError(`词典编译器执行失败: ${reason}`, { cause: error });
    }
  }
}
