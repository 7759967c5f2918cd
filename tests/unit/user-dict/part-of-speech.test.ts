/**
 * Part Of Speech Table Tests
 */

import { describe, it, expect } from 'vitest';
import {
  PART_OF_SPEECH_TABLE,
  WORD_TYPES,
  findPartOfSpeech,
  findPartOfSpeechByContextId,
  getPartOfSpeechByWordType,
} from '../../../src/user-dict';

describe('part-of-speech table', () => {
  it('should contain exactly one row per word type', () => {
    expect(PART_OF_SPEECH_TABLE).toHaveLength(WORD_TYPES.length);
    expect(PART_OF_SPEECH_TABLE.map((row) => row.wordType).sort()).toEqual([...WORD_TYPES].sort());
  });

  it('should keep cost candidates strictly increasing', () => {
    for (const row of PART_OF_SPEECH_TABLE) {
      expect(row.costCandidates).toHaveLength(11);
      for (let i = 1; i < row.costCandidates.length; i++) {
        expect(row.costCandidates[i]).toBeGreaterThan(row.costCandidates[i - 1]);
      }
    }
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(PART_OF_SPEECH_TABLE)).toBe(true);
    expect(Object.isFrozen(PART_OF_SPEECH_TABLE[0])).toBe(true);
  });

  describe('lookup', () => {
    it('should find a row by its part-of-speech quadruple', () => {
      const row = findPartOfSpeech({
        partOfSpeech: '名詞',
        partOfSpeechDetail1: '一般',
        partOfSpeechDetail2: '*',
        partOfSpeechDetail3: '*',
      });

      expect(row?.wordType).toBe('COMMON_NOUN');
      expect(row?.contextId).toBe(1345);
    });

    it('should return undefined for an unknown quadruple', () => {
      expect(
        findPartOfSpeech({
          partOfSpeech: '名詞',
          partOfSpeechDetail1: '代名詞',
          partOfSpeechDetail2: '*',
          partOfSpeechDetail3: '*',
        }),
      ).toBeUndefined();
    });

    it('should find a row by context id', () => {
      expect(findPartOfSpeechByContextId(642)?.wordType).toBe('VERB');
      expect(findPartOfSpeechByContextId(1)).toBeUndefined();
    });

    it('should restrict accent associative rules per row', () => {
      expect(getPartOfSpeechByWordType('PROPER_NOUN').accentAssociativeRules).toEqual([
        '*',
        'C1',
        'C2',
        'C3',
        'C4',
        'C5',
      ]);
      expect(getPartOfSpeechByWordType('ADJECTIVE').accentAssociativeRules).toEqual(['*']);
    });
  });
});
