// apps/api/src/encoding/candidates.ts
import iconv from 'iconv-lite';
import type { CharsetName } from './charsets';
import { ConfigurationError } from './errors';

export type MismatchCheck = 'western-misreads-asian' | 'katakana-flood' | 'ascii-cjk-mix';

export interface EncodingCandidate {
  readonly name: string;
  readonly priority: number;
  readonly checks: readonly MismatchCheck[];
  /** строгий профиль набора для многобайтовых кодировок, см. charsets.json */
  readonly charset?: CharsetName;
}

export const FAST_PATH_ENCODING = 'utf-8';

type CandidateSpec = Omit<EncodingCandidate, 'priority'>;

// Порядок важен: строгие многобайтовые раньше всеядных однобайтовых.
// GBK/GB2312 раньше euc-kr ломают слишком много других кодировок, поэтому стоят после big5.
const KNOWN: readonly CandidateSpec[] = [
  { name: 'shift_jis', checks: ['katakana-flood', 'ascii-cjk-mix'], charset: 'shift_jis' },
  { name: 'euc-kr', checks: ['ascii-cjk-mix'], charset: 'euc-kr' },
  { name: 'big5', checks: ['ascii-cjk-mix'], charset: 'big5' },
  { name: 'gbk', checks: ['ascii-cjk-mix'], charset: 'gbk' },
  { name: 'gb2312', checks: ['ascii-cjk-mix'], charset: 'gb2312' },
  { name: 'cp1251', checks: [] },
  { name: 'iso-8859-2', checks: [] },
  { name: 'cp1252', checks: ['western-misreads-asian'] },
  { name: 'latin-1', checks: ['western-misreads-asian'] },
];

const KNOWN_BY_NAME = new Map(KNOWN.map(c => [c.name, c]));

function withPriorities(specs: readonly CandidateSpec[]): readonly EncodingCandidate[] {
  return Object.freeze(specs.map((c, i) => Object.freeze({ ...c, priority: i + 1 })));
}

export const DEFAULT_CANDIDATES: readonly EncodingCandidate[] = withPriorities(KNOWN);

export function normalizeEncodingName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Собирает упорядоченный реестр из списка имён (по умолчанию — штатный порядок).
 * Имена берутся только из известных описаний: для чужой кодировки мы не знаем,
 * какие эвристики к ней применять.
 */
export function resolveCandidates(names?: readonly string[]): readonly EncodingCandidate[] {
  if (!names) return DEFAULT_CANDIDATES;
  if (names.length === 0) throw new ConfigurationError('encoding candidate list is empty');

  const seen = new Set<string>();
  const specs: CandidateSpec[] = [];
  for (const raw of names) {
    const name = normalizeEncodingName(raw);
    if (name === FAST_PATH_ENCODING) {
      throw new ConfigurationError(`${name} is always tried first and cannot be listed`, name);
    }
    const spec = KNOWN_BY_NAME.get(name);
    if (!spec) throw new ConfigurationError(`unknown encoding candidate: ${raw}`, raw);
    if (seen.has(name)) throw new ConfigurationError(`duplicate encoding candidate: ${name}`, name);
    seen.add(name);
    specs.push(spec);
  }
  return withPriorities(specs);
}

export function assertCandidatesSupported(candidates: readonly EncodingCandidate[]): void {
  for (const c of candidates) {
    if (!iconv.encodingExists(c.name)) {
      throw new ConfigurationError(`codec not supported by iconv-lite: ${c.name}`, c.name);
    }
  }
}

export function checksFor(encoding: string): readonly MismatchCheck[] {
  return KNOWN_BY_NAME.get(normalizeEncodingName(encoding))?.checks ?? [];
}
