// apps/api/src/encoding/decode.ts
import { DEFAULT_CANDIDATES, FAST_PATH_ENCODING, type EncodingCandidate, type MismatchCheck } from './candidates';
import { decodeStrict, decodeUtf8Strict } from './codec';
import { runChecks } from './heuristics';
import { isLikelyText } from './plausibility';

export type AttemptVerdict =
  | { encoding: string; status: 'accepted' }
  | { encoding: string; status: 'rejected-corrupt' }
  | { encoding: string; status: 'rejected-script-mismatch'; check: MismatchCheck }
  | { encoding: string; status: 'decode-error'; reason: string };

export type DetectionResult =
  | { kind: 'text'; text: string; encoding: string; attempts: AttemptVerdict[] }
  | { kind: 'binary'; attempts: AttemptVerdict[] };

function tryCandidate(bytes: Uint8Array, candidate: EncodingCandidate): { verdict: AttemptVerdict; text?: string } {
  const encoding = candidate.name;
  const decoded = decodeStrict(bytes, candidate);
  if (!decoded.ok) return { verdict: { encoding, status: 'decode-error', reason: decoded.reason } };

  if (!isLikelyText(decoded.text)) return { verdict: { encoding, status: 'rejected-corrupt' } };

  const check = runChecks(decoded.text, candidate.checks);
  if (check) return { verdict: { encoding, status: 'rejected-script-mismatch', check } };

  return { verdict: { encoding, status: 'accepted' }, text: decoded.text };
}

/**
 * Подбирает кодировку для буфера неизвестного происхождения.
 *
 * Сначала UTF-8 (только проверка на управляющие символы, без эвристик по письменностям),
 * затем кандидаты строго по порядку; первый принятый вариант и есть ответ.
 * Если не подошёл никто — это бинарный файл, а не ошибка.
 */
export function detectText(
  bytes: Uint8Array,
  candidates: readonly EncodingCandidate[] = DEFAULT_CANDIDATES,
): DetectionResult {
  const attempts: AttemptVerdict[] = [];

  const utf8 = decodeUtf8Strict(bytes);
  if (!utf8.ok) {
    attempts.push({ encoding: FAST_PATH_ENCODING, status: 'decode-error', reason: utf8.reason });
  } else if (isLikelyText(utf8.text)) {
    attempts.push({ encoding: FAST_PATH_ENCODING, status: 'accepted' });
    return { kind: 'text', text: utf8.text, encoding: FAST_PATH_ENCODING, attempts };
  } else {
    attempts.push({ encoding: FAST_PATH_ENCODING, status: 'rejected-corrupt' });
  }

  for (const candidate of candidates) {
    if (candidate.name === FAST_PATH_ENCODING) continue;
    const { verdict, text } = tryCandidate(bytes, candidate);
    attempts.push(verdict);
    if (text !== undefined) return { kind: 'text', text, encoding: candidate.name, attempts };
  }

  return { kind: 'binary', attempts };
}

/** Текст или null, если буфер — бинарные данные. */
export function decodeWithFallback(
  bytes: Uint8Array,
  candidates: readonly EncodingCandidate[] = DEFAULT_CANDIDATES,
): string | null {
  const res = detectText(bytes, candidates);
  return res.kind === 'text' ? res.text : null;
}
