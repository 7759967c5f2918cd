/**
 * 基础词典（随程序分发、只读）
 *
 * 基础词典由若干 zstd 压缩的 CSV 文件组成，按文件名字典序拼接。
 */

import path from 'path';
import type { Dirent } from 'fs';
import { readdir, readFile } from 'fs/promises';
import { decompress } from 'fzstd';
import { isFileNotFound } from './fs-utils';

export const BASE_LEXICON_EXTENSION = '.csv.zst';

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * 列出基础词典文件，按文件名字典序排列；目录不存在时返回空数组
 */
export async function listBaseLexiconFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isFileNotFound(error)) {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(BASE_LEXICON_EXTENSION))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}

/**
 * 解压并拼接基础词典，保证每个文件的内容以换行结尾
 */
export async function readBaseLexicon(files: readonly string[]): Promise<string> {
  let text = '';
  for (const file of files) {
    const compressed = await readFile(file);
    let content = decoder.decode(decompress(compressed));
    if (!content.endsWith('\n')) {
      content += '\n';
    }
    text += content;
  }
  return text;
}
