import path from 'path';
import { mkdir } from 'fs/promises';
import type { Env } from './env';

/** 用户词典文件名 */
export const USER_DICT_FILENAME = 'user_dict.json';

/** 编译后词典文件名 */
export const COMPILED_DICT_FILENAME = 'user.dic';

/** 基础词典所在的资源子目录 */
export const BASE_LEXICON_DIRNAME = 'dictionaries';

/** 默认系统词典目录名 */
export const SYSTEM_DICT_DIRNAME = 'open_jtalk_dic';

export interface UserDictPaths {
  dataDir: string;
  resourceDir: string;
  baseLexiconDir: string;
  userDictPath: string;
  compiledDictPath: string;
  systemDictDir: string;
}

type PathEnv = Pick<Env, 'USER_DICT_DATA_DIR' | 'USER_DICT_RESOURCE_DIR' | 'MECAB_SYSTEM_DICT_DIR'>;

/**
 * 解析用户词典相关路径，相对路径以 cwd 为基准
 */
export function resolveUserDictPaths(config: PathEnv, cwd: string = process.cwd()): UserDictPaths {
  const dataDir = path.resolve(cwd, config.USER_DICT_DATA_DIR);
  const resourceDir = path.resolve(cwd, config.USER_DICT_RESOURCE_DIR);

  return {
    dataDir,
    resourceDir,
    baseLexiconDir: path.join(resourceDir, BASE_LEXICON_DIRNAME),
    userDictPath: path.join(dataDir, USER_DICT_FILENAME),
    compiledDictPath: path.join(dataDir, COMPILED_DICT_FILENAME),
    systemDictDir: config.MECAB_SYSTEM_DICT_DIR
      ? path.resolve(cwd, config.MECAB_SYSTEM_DICT_DIR)
      : path.join(resourceDir, SYSTEM_DICT_DIRNAME),
  };
}

/**
 * 确保保存目录存在
 */
export async function ensureDataDir(paths: Pick<UserDictPaths, 'dataDir'>): Promise<void> {
  await mkdir(paths.dataDir, { recursive: true });
}
