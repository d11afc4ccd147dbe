// apps/api/src/encoding/heuristics.ts
import { checksFor, type MismatchCheck } from './candidates';

// короче — статистика бессмысленна
const MIN_LENGTH = 4;

type Range = readonly [number, number];

const HIGH_LATIN: Range = [0x0080, 0x024f]; // Latin-1 Supplement + Latin Extended-A/B
const HALF_WIDTH_KATAKANA: Range = [0xff61, 0xff9f];
const CJK_UNIFIED: Range = [0x4e00, 0x9fff];

const inRange = (cp: number, [lo, hi]: Range) => cp >= lo && cp <= hi;

function isAsciiLetter(cp: number) {
  return (cp >= 0x41 && cp <= 0x5a) || (cp >= 0x61 && cp <= 0x7a);
}

type Counts = {
  length: number;
  highLatin: number;
  spaces: number;
  katakana: number;
  ascii: number;
  asciiLetters: number;
  cjk: number;
};

function countCodePoints(text: string): Counts {
  const c: Counts = { length: 0, highLatin: 0, spaces: 0, katakana: 0, ascii: 0, asciiLetters: 0, cjk: 0 };
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    c.length++;
    if (cp === 0x20) c.spaces++;
    if (cp < 128) {
      c.ascii++;
      if (isAsciiLetter(cp)) c.asciiLetters++;
    } else if (inRange(cp, HIGH_LATIN)) c.highLatin++;
    else if (inRange(cp, HALF_WIDTH_KATAKANA)) c.katakana++;
    else if (inRange(cp, CJK_UNIFIED)) c.cjk++;
  }
  return c;
}

/**
 * cp1252/latin-1 поверх многобайтового азиатского текста: сплошная «высокая латиница»
 * почти без пробелов.
 */
function westernMisreadsAsian(c: Counts): boolean {
  return c.highLatin / c.length > 0.5 && c.spaces < c.length * 0.1;
}

// shift_jis, читающий GB2312, даёт лавину полуширинной катаканы
function katakanaFlood(c: Counts): boolean {
  return c.katakana / c.length > 0.3;
}

/**
 * Азиатская кодировка поверх западного текста: ASCII-буквы вперемешку с редкими иероглифами.
 * Настоящий CJK-текст почти целиком из иероглифов, ASCII там — пунктуация.
 */
function asciiCjkMix(c: Counts): boolean {
  if (c.ascii === 0 || c.cjk === 0) return false;
  return c.asciiLetters >= 2 && c.cjk / c.length < 0.5;
}

const CHECKS: Record<MismatchCheck, (c: Counts) => boolean> = {
  'western-misreads-asian': westernMisreadsAsian,
  'katakana-flood': katakanaFlood,
  'ascii-cjk-mix': asciiCjkMix,
};

/** Первая сработавшая проверка или null. */
export function runChecks(text: string, checks: readonly MismatchCheck[]): MismatchCheck | null {
  if (checks.length === 0) return null;
  const counts = countCodePoints(text);
  if (counts.length < MIN_LENGTH) return null;
  for (const check of checks) {
    if (CHECKS[check](counts)) return check;
  }
  return null;
}

export function isMisencodedAsianText(text: string, encoding: string): boolean {
  const checks = checksFor(encoding).filter(c => c === 'western-misreads-asian');
  return runChecks(text, checks) !== null;
}

export function isMisencodedCrossAsian(text: string, encoding: string): boolean {
  const checks = checksFor(encoding).filter(c => c === 'katakana-flood' || c === 'ascii-cjk-mix');
  return runChecks(text, checks) !== null;
}
