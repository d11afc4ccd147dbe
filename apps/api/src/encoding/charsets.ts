// apps/api/src/encoding/charsets.ts
import rawCharsets from './charsets.json';
import { ConfigurationError } from './errors';

/**
 * Строгие профили многобайтовых кодировок. Таблицы iconv-lite шире настоящих
 * наборов (CP932, CP949, CP936, Big5-HKSCS), поэтому перед декодированием
 * буфер проверяется по грамматике набора.
 *
 * Формат charsets.json:
 *  - `single` / `lead` / `trail` — диапазоны байтов `"a1-fe"` или один байт `"80"`;
 *  - `excluded` — блоки ячеек `"lead:trail"`, которых в наборе нет, напр. `"aa-af:a1-fe"`;
 *  - `overrides` — ячейки, которые таблица iconv-lite отображает иначе, чем набор.
 */
export type CharsetName = 'shift_jis' | 'euc-kr' | 'big5' | 'gbk' | 'gb2312';

interface RawCharset {
  single: string[];
  lead: string[];
  trail: string[];
  excluded: string[];
  overrides: Record<string, string>;
}

type ByteRange = readonly [number, number];

interface CellBlock {
  readonly lead: ByteRange;
  readonly trail: ByteRange;
}

export interface CharsetProfile {
  readonly name: CharsetName;
  readonly single: readonly ByteRange[];
  readonly lead: readonly ByteRange[];
  readonly trail: readonly ByteRange[];
  readonly excluded: readonly CellBlock[];
  /** ключ — байт (одиночная ячейка) или `lead << 8 | trail` */
  readonly overrides: ReadonlyMap<number, string>;
}

export type CharsetSegment =
  | { kind: 'codec'; bytes: Uint8Array }
  | { kind: 'override'; text: string };

const RAW: Record<CharsetName, RawCharset> = rawCharsets;

const HEX_BYTE = /^[0-9a-f]{2}$/;

function parseByte(s: string, charset: CharsetName): number {
  if (!HEX_BYTE.test(s)) throw new ConfigurationError(`bad byte "${s}" in charset table`, charset);
  return parseInt(s, 16);
}

function parseRange(s: string, charset: CharsetName): ByteRange {
  const [lo, hi = lo] = s.split('-');
  const range: ByteRange = [parseByte(lo, charset), parseByte(hi, charset)];
  if (range[0] > range[1]) throw new ConfigurationError(`empty byte range "${s}" in charset table`, charset);
  return range;
}

function parseBlock(s: string, charset: CharsetName): CellBlock {
  const parts = s.split(':');
  if (parts.length !== 2) throw new ConfigurationError(`bad cell block "${s}" in charset table`, charset);
  return { lead: parseRange(parts[0], charset), trail: parseRange(parts[1], charset) };
}

function parseCell(s: string, charset: CharsetName): number {
  if (s.length === 2) return parseByte(s, charset);
  if (s.length !== 4) throw new ConfigurationError(`bad cell "${s}" in charset table`, charset);
  return (parseByte(s.slice(0, 2), charset) << 8) | parseByte(s.slice(2), charset);
}

function compile(name: CharsetName): CharsetProfile {
  const raw = RAW[name];
  return {
    name,
    single: raw.single.map(s => parseRange(s, name)),
    lead: raw.lead.map(s => parseRange(s, name)),
    trail: raw.trail.map(s => parseRange(s, name)),
    excluded: raw.excluded.map(s => parseBlock(s, name)),
    overrides: new Map(Object.entries(raw.overrides).map(([cell, text]): [number, string] => [parseCell(cell, name), text])),
  };
}

export const CHARSETS: Readonly<Record<CharsetName, CharsetProfile>> = Object.freeze({
  shift_jis: compile('shift_jis'),
  'euc-kr': compile('euc-kr'),
  big5: compile('big5'),
  gbk: compile('gbk'),
  gb2312: compile('gb2312'),
});

const inRanges = (b: number, ranges: readonly ByteRange[]) => ranges.some(([lo, hi]) => b >= lo && b <= hi);

function isExcluded(lead: number, trail: number, blocks: readonly CellBlock[]): boolean {
  return blocks.some(blk => inRanges(lead, [blk.lead]) && inRanges(trail, [blk.trail]));
}

/**
 * Режет буфер по ячейкам набора. Подряд идущие обычные ячейки склеиваются
 * в один кусок для iconv-lite, ячейки из `overrides` идут отдельно.
 * `null` — байты вне грамматики (обрыв пары, чужой lead/trail, пустая ячейка).
 */
export function segmentBytes(buf: Uint8Array, profile: CharsetProfile): CharsetSegment[] | null {
  const segments: CharsetSegment[] = [];
  let runStart = 0;
  let i = 0;

  while (i < buf.length) {
    const b = buf[i];
    let cell = b;
    let width = 1;

    if (!inRanges(b, profile.single)) {
      if (!inRanges(b, profile.lead) || i + 1 >= buf.length) return null;
      const trail = buf[i + 1];
      if (!inRanges(trail, profile.trail) || isExcluded(b, trail, profile.excluded)) return null;
      cell = (b << 8) | trail;
      width = 2;
    }

    const text = profile.overrides.get(cell);
    if (text !== undefined) {
      if (i > runStart) segments.push({ kind: 'codec', bytes: buf.subarray(runStart, i) });
      segments.push({ kind: 'override', text });
      runStart = i + width;
    }
    i += width;
  }

  if (buf.length > runStart) segments.push({ kind: 'codec', bytes: buf.subarray(runStart) });
  return segments;
}
