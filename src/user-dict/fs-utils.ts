import { stat } from 'fs/promises';

export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * 路径存在且为普通文件；不存在返回 false，其余 I/O 错误照常抛出
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (isFileNotFound(error)) {
      return false;
    }
    throw error;
  }
}
