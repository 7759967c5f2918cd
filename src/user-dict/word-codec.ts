/**
 * 单词编解码
 *
 * - WordProperty → WordRecord（校验品詞 / アクセント結合規則 / 优先级 / 发音）
 * - WordRecord ⇄ SaveFormatWordRecord（priority ⇄ cost）
 * - priority ⇄ cost 换算
 */

import { ValidationError } from './errors';
import { countMora, normalizePronunciation, toZenkaku } from './kana';
import {
  findPartOfSpeech,
  findPartOfSpeechByContextId,
  getPartOfSpeechByWordType,
} from './part-of-speech';
import type { PartOfSpeechDetail } from './part-of-speech';
import {
  DEFAULT_PRIORITY,
  DEFAULT_WORD_TYPE,
  MAX_PRIORITY,
  MIN_PRIORITY,
} from './types';
import type {
  SaveFormatWordRecord,
  StoredWordRecord,
  WordProperty,
  WordRecord,
} from './types';

/** 未指定品詞的单词属性字段的占位值 */
const UNSPECIFIED = '*';

// ==================== priority ⇄ cost ====================

function assertPriority(priority: number): void {
  if (!Number.isInteger(priority) || priority < MIN_PRIORITY || priority > MAX_PRIORITY) {
    throw new ValidationError(
      `优先级必须是 ${MIN_PRIORITY} 到 ${MAX_PRIORITY} 之间的整数（收到 ${priority}）`,
    );
  }
}

function requireContext(contextId: number): PartOfSpeechDetail {
  const detail = findPartOfSpeechByContextId(contextId);
  if (!detail) {
    throw new ValidationError(`不支持的品詞 ID: ${contextId}`);
  }
  return detail;
}

/**
 * 优先级 → 编译器使用的 cost，优先级越高 cost 越低
 */
export function costFromPriority(contextId: number, priority: number): number {
  assertPriority(priority);
  return requireContext(contextId).costCandidates[MAX_PRIORITY - priority];
}

/**
 * cost → 优先级，取最接近的候选值，距离相同时取优先级较高者
 */
export function priorityFromCost(contextId: number, cost: number): number {
  const candidates = requireContext(contextId).costCandidates;

  let bestIndex = 0;
  candidates.forEach((candidate, index) => {
    if (Math.abs(candidate - cost) < Math.abs(candidates[bestIndex] - cost)) {
      bestIndex = index;
    }
  });

  return MAX_PRIORITY - bestIndex;
}

// ==================== 校验 ====================

function assertAccentType(accentType: number, moraCount: number): void {
  if (!Number.isInteger(accentType) || accentType < 0 || accentType > moraCount) {
    throw new ValidationError(
      `アクセント型必须是 0 到 ${moraCount} 之间的整数（收到 ${accentType}）`,
    );
  }
}

function normalizeSurface(surface: string): string {
  if (surface.trim().length === 0) {
    throw new ValidationError('表层形不能为空');
  }
  return toZenkaku(surface);
}

/**
 * 校验完整单词记录，返回规范化后的副本
 *
 * 品詞四元组必须与参照表中的某一行完全一致，contextId 与该行一致，
 * 且アクセント結合規則属于该行允许的集合；不做任何自动修正。
 */
export function validateRecord(record: WordRecord): WordRecord {
  assertPriority(record.priority);

  const detail = findPartOfSpeech(record);
  if (!detail) {
    throw new ValidationError(
      `不支持的品詞组合: ${record.partOfSpeech},${record.partOfSpeechDetail1},` +
        `${record.partOfSpeechDetail2},${record.partOfSpeechDetail3}`,
    );
  }
  if (detail.contextId !== record.contextId) {
    throw new ValidationError(
      `品詞 ID ${record.contextId} 与品詞 ${detail.label}（${detail.contextId}）不一致`,
    );
  }
  if (!detail.accentAssociativeRules.includes(record.accentAssociativeRule)) {
    throw new ValidationError(
      `${detail.label} 不允许使用アクセント結合規則 ${record.accentAssociativeRule}`,
    );
  }

  const pronunciation = normalizePronunciation(record.pronunciation);
  const moraCount = countMora(pronunciation);
  if (record.moraCount !== moraCount) {
    throw new ValidationError(
      `mora 数 ${record.moraCount} 与发音计算值 ${moraCount} 不一致`,
    );
  }
  assertAccentType(record.accentType, moraCount);

  return {
    ...record,
    surface: normalizeSurface(record.surface),
    pronunciation,
  };
}

// ==================== 转换 ====================

/**
 * 单词属性 → 单词记录
 */
export function toRecord(property: WordProperty): WordRecord {
  const priority = property.priority ?? DEFAULT_PRIORITY;
  assertPriority(priority);

  const detail = getPartOfSpeechByWordType(property.wordType ?? DEFAULT_WORD_TYPE);
  const pronunciation = normalizePronunciation(property.pronunciation);
  const moraCount = countMora(pronunciation);
  assertAccentType(property.accentType, moraCount);

  return validateRecord({
    surface: normalizeSurface(property.surface),
    priority,
    contextId: detail.contextId,
    partOfSpeech: detail.partOfSpeech,
    partOfSpeechDetail1: detail.partOfSpeechDetail1,
    partOfSpeechDetail2: detail.partOfSpeechDetail2,
    partOfSpeechDetail3: detail.partOfSpeechDetail3,
    inflectionalType: UNSPECIFIED,
    inflectionalForm: UNSPECIFIED,
    stem: UNSPECIFIED,
    yomi: pronunciation,
    pronunciation,
    accentType: property.accentType,
    moraCount,
    accentAssociativeRule: UNSPECIFIED,
  });
}

/**
 * 单词记录 → 磁盘保存格式
 */
export function toSaveFormat(record: WordRecord): SaveFormatWordRecord {
  return {
    surface: record.surface,
    cost: costFromPriority(record.contextId, record.priority),
    context_id: record.contextId,
    part_of_speech: record.partOfSpeech,
    part_of_speech_detail_1: record.partOfSpeechDetail1,
    part_of_speech_detail_2: record.partOfSpeechDetail2,
    part_of_speech_detail_3: record.partOfSpeechDetail3,
    inflectional_type: record.inflectionalType,
    inflectional_form: record.inflectionalForm,
    stem: record.stem,
    yomi: record.yomi,
    pronunciation: record.pronunciation,
    accent_type: record.accentType,
    mora_count: record.moraCount,
    accent_associative_rule: record.accentAssociativeRule,
  };
}

/**
 * 磁盘保存格式 → 单词记录
 *
 * 缺少 context_id 时视为固有名詞；mora_count 由发音重新计算，
 * 若文件中存在则必须与计算值一致。
 */
export function fromSaveFormat(saved: StoredWordRecord): WordRecord {
  const contextId = saved.context_id ?? getPartOfSpeechByWordType(DEFAULT_WORD_TYPE).contextId;
  const pronunciation = normalizePronunciation(saved.pronunciation);

  return validateRecord({
    surface: saved.surface,
    priority: priorityFromCost(contextId, saved.cost),
    contextId,
    partOfSpeech: saved.part_of_speech,
    partOfSpeechDetail1: saved.part_of_speech_detail_1,
    partOfSpeechDetail2: saved.part_of_speech_detail_2,
    partOfSpeechDetail3: saved.part_of_speech_detail_3,
    inflectionalType: saved.inflectional_type,
    inflectionalForm: saved.inflectional_form,
    stem: saved.stem,
    yomi: saved.yomi,
    pronunciation,
    accentType: saved.accent_type,
    moraCount: saved.mora_count ?? countMora(pronunciation),
    accentAssociativeRule: saved.accent_associative_rule,
  });
}

/**
 * 导入条目区分：带品詞字段的是完整记录
 */
export function isWordRecord(word: WordProperty | WordRecord): word is WordRecord {
  return 'partOfSpeech' in word;
}
