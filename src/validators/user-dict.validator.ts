import { z } from 'zod';
import { WORD_TYPES, wordIdSchema } from '../user-dict';

// 优先级范围、品詞组合等业务规则由 word-codec 校验（返回 422），这里只校验结构

export const wordPropertySchema = z.object({
  surface: z.string().min(1, '表层形不能为空'),
  pronunciation: z.string().min(1, '发音不能为空'),
  accentType: z.number().int('アクセント型必须是整数'),
  wordType: z.enum(WORD_TYPES).optional(),
  priority: z.number().int('优先级必须是整数').optional(),
});

export const wordRecordSchema = z.object({
  surface: z.string().min(1, '表层形不能为空'),
  priority: z.number().int(),
  contextId: z.number().int(),
  partOfSpeech: z.string(),
  partOfSpeechDetail1: z.string(),
  partOfSpeechDetail2: z.string(),
  partOfSpeechDetail3: z.string(),
  inflectionalType: z.string(),
  inflectionalForm: z.string(),
  stem: z.string(),
  yomi: z.string(),
  pronunciation: z.string().min(1, '发音不能为空'),
  accentType: z.number().int(),
  moraCount: z.number().int(),
  accentAssociativeRule: z.string(),
});

export const importWordsSchema = z.object({
  // 完整记录优先匹配；按单词属性处理的条目不允许出现多余字段，
  // 否则不完整的记录会被当作单词属性接受，品詞信息被丢弃
  words: z.record(z.string(), z.union([wordRecordSchema, wordPropertySchema.strict()])),
  override: z.boolean().default(false),
});

export const wordIdParamsSchema = z.object({
  wordId: wordIdSchema,
});

export type WordPropertyDto = z.infer<typeof wordPropertySchema>;
export type ImportWordsDto = z.infer<typeof importWordsSchema>;
