// ==================== 单词类别 ====================

export const WORD_TYPES = ['PROPER_NOUN', 'COMMON_NOUN', 'VERB', 'ADJECTIVE', 'SUFFIX'] as const;

export type WordType = (typeof WORD_TYPES)[number];

export const DEFAULT_WORD_TYPE: WordType = 'PROPER_NOUN';

// ==================== 优先级 ====================

export const MIN_PRIORITY = 0;
export const MAX_PRIORITY = 10;
export const DEFAULT_PRIORITY = 5;

// ==================== 单词数据 ====================

/**
 * 对外的单词属性（API 输入）
 */
export interface WordProperty {
  /** 表层形 */
  surface: string;
  /** 发音（片假名，平假名会被转换） */
  pronunciation: string;
  /** アクセント型：音调下降位置的 mora 序号，0 为平板型 */
  accentType: number;
  wordType?: WordType;
  /** 0-10，越大越优先被分词器选中 */
  priority?: number;
}

/**
 * 用户词典中存储的单词
 */
export interface WordRecord {
  surface: string;
  priority: number;
  contextId: number;
  partOfSpeech: string;
  partOfSpeechDetail1: string;
  partOfSpeechDetail2: string;
  partOfSpeechDetail3: string;
  inflectionalType: string;
  inflectionalForm: string;
  stem: string;
  yomi: string;
  pronunciation: string;
  accentType: number;
  moraCount: number;
  accentAssociativeRule: string;
}

/**
 * 单词 ID（UUID）到单词的映射
 */
export type UserDictionary = Record<string, WordRecord>;

/**
 * 导入时每个条目既可以是单词属性，也可以是完整的单词记录
 */
export type ImportableWord = WordProperty | WordRecord;

/**
 * 磁盘保存格式：priority 以 cost 形式保存
 */
export interface SaveFormatWordRecord {
  surface: string;
  cost: number;
  context_id: number;
  part_of_speech: string;
  part_of_speech_detail_1: string;
  part_of_speech_detail_2: string;
  part_of_speech_detail_3: string;
  inflectional_type: string;
  inflectional_form: string;
  stem: string;
  yomi: string;
  pronunciation: string;
  accent_type: number;
  mora_count: number;
  accent_associative_rule: string;
}

/**
 * 旧版本文件可能缺少 context_id / mora_count
 */
export type StoredWordRecord = Omit<SaveFormatWordRecord, 'context_id' | 'mora_count'> & {
  context_id?: number;
  mora_count?: number;
};
