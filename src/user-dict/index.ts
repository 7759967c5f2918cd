/**
 * User Dictionary Module
 *
 * - Word Codec: property ⇄ record ⇄ save format, priority ⇄ cost
 * - Persistent Store: user_dict.json guarded by the store lock
 * - Compilation Pipeline: base lexicon + user words → compiled dictionary hot swap
 */

// ==================== Types ====================
export * from './types';
export * from './errors';

// ==================== Word Codec ====================
export { parseWordId, wordIdSchema } from './word-id';
export {
  PART_OF_SPEECH_TABLE,
  findPartOfSpeech,
  findPartOfSpeechByContextId,
  getPartOfSpeechByWordType,
} from './part-of-speech';
export type { PartOfSpeechDetail, PartOfSpeechKey } from './part-of-speech';
export { countMora, normalizePronunciation, toKatakana, toZenkaku } from './kana';
export {
  costFromPriority,
  priorityFromCost,
  toRecord,
  validateRecord,
  toSaveFormat,
  fromSaveFormat,
  isWordRecord,
} from './word-codec';

// ==================== Persistent Store ====================
export { isFile, isFileNotFound } from './fs-utils';
export { UserDictStore } from './user-dict-store';
export type { StoreMutation } from './user-dict-store';

// ==================== Compilation Pipeline ====================
export { ActiveDictionarySlot } from './active-dictionary';
export type { ActiveDictionaryHandle, ActiveDictionaryListener } from './active-dictionary';
export { MecabDictIndexCompiler } from './dictionary-compiler';
export type { DictionaryCompiler, MecabDictIndexOptions } from './dictionary-compiler';
export { BASE_LEXICON_EXTENSION, listBaseLexiconFiles, readBaseLexicon } from './base-lexicon';
export {
  CompilationPipeline,
  formatSourceLine,
  isCompilationUnsupported,
} from './compilation-pipeline';
export type {
  CompilationOutcome,
  CompilationPipelineOptions,
  CompilationState,
  UserDictSnapshotSource,
} from './compilation-pipeline';
