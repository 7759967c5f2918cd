import { z } from 'zod';

/**
 * 单词 ID：任意版本的 UUID，统一为小写
 */
export const wordIdSchema = z
  .string()
  .uuid('单词 ID 必须是 UUID')
  .transform((id) => id.toLowerCase());

/**
 * 规范化单词 ID，不是 UUID 时返回 null
 */
export function parseWordId(id: string): string | null {
  const parsed = wordIdSchema.safeParse(id);
  return parsed.success ? parsed.data : null;
}
