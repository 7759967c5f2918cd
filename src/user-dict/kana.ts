/**
 * 假名处理：发音校验、mora 计数、表层形全角化
 */

import { ValidationError } from './errors';

/** 捨て仮名（小书假名）。末尾的ッ单独处理 */
const SUTEGANA = ['ァ', 'ィ', 'ゥ', 'ェ', 'ォ', 'ャ', 'ュ', 'ョ', 'ヮ', 'ッ'] as const;
const SOKUON = 'ッ';
const SUTEGANA_EXCEPT_SOKUON: ReadonlySet<string> = new Set(SUTEGANA.filter((kana) => kana !== SOKUON));
const ALL_SUTEGANA: ReadonlySet<string> = new Set(SUTEGANA);

const KATAKANA_PATTERN = /^[ァ-ヴー]+$/;

// 两字符组成一个 mora 的组合，必须排在单字符规则之前
const RULE_OTHERS = '[イ][ェ]|[ヴ][ャュョ]|[トド][ゥ]|[テデ][ィャュョ]|[デ][ェ]|[クグ][ヮ]';
const RULE_LINE_I = '[キシチニヒミリギジビピ][ェャュョ]';
const RULE_LINE_U = '[ツフヴ][ァ]|[ウスツフヴズ][ィ]|[ウツフヴ][ェォ]';
const RULE_ONE_MORA = '[ァ-ヴー]';

const MORA_PATTERN = new RegExp(
  `(?:${RULE_OTHERS}|${RULE_LINE_I}|${RULE_LINE_U}|${RULE_ONE_MORA})`,
  'g',
);

// ぁ(U+3041)〜ゖ(U+3096) → ァ(U+30A1)〜ヶ(U+30F6)
const KATAKANA_OFFSET = 0x60;

// !(U+0021)〜~(U+007E) → ！(U+FF01)〜～(U+FF5E)
const FULLWIDTH_OFFSET = 0xfee0;

/**
 * 平假名转片假名，其余字符原样保留
 */
export function toKatakana(text: string): string {
  return text.replace(/[ぁ-ゖ]/g, (char) => String.fromCharCode(char.charCodeAt(0) + KATAKANA_OFFSET));
}

/**
 * 可打印 ASCII（!〜~）转全角
 */
export function toZenkaku(text: string): string {
  return text.replace(/[!-~]/g, (char) => String.fromCharCode(char.charCodeAt(0) + FULLWIDTH_OFFSET));
}

/**
 * 规范化并校验发音，返回片假名形式
 */
export function normalizePronunciation(pronunciation: string): string {
  const katakana = toKatakana(pronunciation);

  if (!KATAKANA_PATTERN.test(katakana)) {
    throw new ValidationError('发音必须是有效的片假名');
  }

  const chars = Array.from(katakana);
  chars.forEach((char, i) => {
    const next = chars[i + 1];
    if (ALL_SUTEGANA.has(char) && next !== undefined) {
      // 「キャット」中ャ与ッ相邻是合法的；ッッ 或 捨て仮名后接ッ以外的捨て仮名不合法
      if (SUTEGANA_EXCEPT_SOKUON.has(next) || (char === SOKUON && next === SOKUON)) {
        throw new ValidationError('无效的发音：捨て仮名连续出现');
      }
    }
    if (char === 'ヮ' && i !== 0 && chars[i - 1] !== 'ク' && chars[i - 1] !== 'グ') {
      throw new ValidationError('无效的发音：「ヮ」只能用于「クヮ」「グヮ」');
    }
  });

  return katakana;
}

/**
 * 计算片假名发音的 mora 数
 */
export function countMora(pronunciation: string): number {
  return pronunciation.match(MORA_PATTERN)?.length ?? 0;
}
