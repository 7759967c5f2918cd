/**
 * 品詞参照表
 *
 * 进程启动时从 data/part-of-speech.json 加载一次，之后只读。
 * 按 (品詞, 細分類1, 細分類2, 細分類3) 与 contextId 建立索引，查找为 O(1)。
 */

import { z } from 'zod';
import rawTable from '../data/part-of-speech.json';
import { MAX_PRIORITY, MIN_PRIORITY, WORD_TYPES } from './types';
import type { WordType } from './types';

const COST_CANDIDATE_COUNT = MAX_PRIORITY - MIN_PRIORITY + 1;

const partOfSpeechDetailSchema = z.object({
  wordType: z.enum(WORD_TYPES),
  label: z.string().min(1),
  partOfSpeech: z.string().min(1),
  partOfSpeechDetail1: z.string().min(1),
  partOfSpeechDetail2: z.string().min(1),
  partOfSpeechDetail3: z.string().min(1),
  contextId: z.number().int(),
  // 下标 0 对应最高优先级；必须严格递增，保证优先级越高 cost 越低
  costCandidates: z
    .array(z.number().int())
    .length(COST_CANDIDATE_COUNT)
    .refine((costs) => costs.every((cost, i) => i === 0 || costs[i - 1] < cost), {
      message: 'costCandidates 必须严格递增',
    }),
  accentAssociativeRules: z.array(z.string().min(1)).min(1),
});

export type PartOfSpeechDetail = z.infer<typeof partOfSpeechDetailSchema>;

export type PartOfSpeechKey = Pick<
  PartOfSpeechDetail,
  'partOfSpeech' | 'partOfSpeechDetail1' | 'partOfSpeechDetail2' | 'partOfSpeechDetail3'
>;

function toIndexKey(key: PartOfSpeechKey): string {
  return [
    key.partOfSpeech,
    key.partOfSpeechDetail1,
    key.partOfSpeechDetail2,
    key.partOfSpeechDetail3,
  ].join('\t');
}

function loadTable(): readonly PartOfSpeechDetail[] {
  const rows = z.array(partOfSpeechDetailSchema).parse(rawTable);

  for (const wordType of WORD_TYPES) {
    const count = rows.filter((row) => row.wordType === wordType).length;
    if (count !== 1) {
      throw new Error(`品詞参照表中 ${wordType} 必须恰好出现一次（实际 ${count} 次）`);
    }
  }

  return Object.freeze(rows.map((row) => Object.freeze(row)));
}

export const PART_OF_SPEECH_TABLE = loadTable();

const byKey = new Map<string, PartOfSpeechDetail>();
const byContextId = new Map<number, PartOfSpeechDetail>();
const byWordType = new Map<WordType, PartOfSpeechDetail>();

for (const row of PART_OF_SPEECH_TABLE) {
  const key = toIndexKey(row);
  if (byKey.has(key) || byContextId.has(row.contextId)) {
    throw new Error(`品詞参照表存在重复条目: ${key} / ${row.contextId}`);
  }
  byKey.set(key, row);
  byContextId.set(row.contextId, row);
  byWordType.set(row.wordType, row);
}

export function findPartOfSpeech(key: PartOfSpeechKey): PartOfSpeechDetail | undefined {
  return byKey.get(toIndexKey(key));
}

export function findPartOfSpeechByContextId(contextId: number): PartOfSpeechDetail | undefined {
  return byContextId.get(contextId);
}

export function getPartOfSpeechByWordType(wordType: WordType): PartOfSpeechDetail {
  const row = byWordType.get(wordType);
  if (!row) {
    // loadTable 已保证每个 WordType 都存在
    throw new Error(`未知的单词类别: ${wordType}`);
  }
  return row;
}
