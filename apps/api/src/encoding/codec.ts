// apps/api/src/encoding/codec.ts
import iconv from 'iconv-lite';
import type { EncodingCandidate } from './candidates';
import { CHARSETS, segmentBytes } from './charsets';

// iconv-lite подставляет его вместо недопустимых последовательностей
const REPLACEMENT_CHAR = '\uFFFD';

export type StrictDecode =
  | { ok: true; text: string }
  | { ok: false; reason: string };

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Строгая проверка UTF-8: без overlong-форм, суррогатов и кодов выше U+10FFFF. */
export function isValidUtf8(buf: Uint8Array): boolean {
  let i = 0;
  while (i < buf.length) {
    const b0 = buf[i];

    // ASCII
    if (b0 <= 0x7f) {
      i += 1;
      continue;
    }

    // 2-byte
    if ((b0 & 0xe0) === 0xc0) {
      // запрет overlong: 0xC0/0xC1
      if (b0 < 0xc2) return false;
      if (i + 1 >= buf.length) return false;
      if ((buf[i + 1] & 0xc0) !== 0x80) return false;
      i += 2;
      continue;
    }

    // 3-byte
    if ((b0 & 0xf0) === 0xe0) {
      if (i + 2 >= buf.length) return false;
      const b1 = buf[i + 1];
      if ((b1 & 0xc0) !== 0x80 || (buf[i + 2] & 0xc0) !== 0x80) return false;
      if (b0 === 0xe0 && b1 < 0xa0) return false; // overlong
      if (b0 === 0xed && b1 >= 0xa0) return false; // суррогаты U+D800..U+DFFF
      i += 3;
      continue;
    }

    // 4-byte
    if ((b0 & 0xf8) === 0xf0) {
      if (b0 > 0xf4) return false;
      if (i + 3 >= buf.length) return false;
      const b1 = buf[i + 1];
      if ((b1 & 0xc0) !== 0x80 || (buf[i + 2] & 0xc0) !== 0x80 || (buf[i + 3] & 0xc0) !== 0x80) return false;
      if (b0 === 0xf0 && b1 < 0x90) return false; // overlong
      if (b0 === 0xf4 && b1 > 0x8f) return false; // выше U+10FFFF
      i += 4;
      continue;
    }

    return false;
  }
  return true;
}

export function decodeUtf8Strict(bytes: Uint8Array): StrictDecode {
  if (!isValidUtf8(bytes)) return { ok: false, reason: 'invalid utf-8 sequence' };
  // BOM не срезаем: результат — ровно то, что лежит в файле
  return { ok: true, text: toBuffer(bytes).toString('utf8') };
}

function decodeWithCodec(bytes: Uint8Array, encoding: string): StrictDecode {
  const buf = toBuffer(bytes);
  let text: string;
  try {
    text = iconv.decode(buf, encoding);
  } catch (e: unknown) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }

  if (text.includes(REPLACEMENT_CHAR)) return { ok: false, reason: 'invalid byte sequence' };
  // ячейки-дубликаты декодируются, но кодируются обратно в другие байты
  if (!iconv.encode(text, encoding).equals(buf)) return { ok: false, reason: 'lossy decode' };
  return { ok: true, text };
}

/**
 * Декодирует весь буфер одной кодировкой. iconv-lite не бросает на мусоре,
 * а подставляет U+FFFD — считаем это ошибкой последовательности. Результат
 * обязан кодироваться обратно в те же байты.
 */
export function decodeStrict(bytes: Uint8Array, candidate: EncodingCandidate): StrictDecode {
  if (!candidate.charset) return decodeWithCodec(bytes, candidate.name);

  const segments = segmentBytes(bytes, CHARSETS[candidate.charset]);
  if (!segments) return { ok: false, reason: `bytes outside ${candidate.charset} grammar` };

  let text = '';
  for (const seg of segments) {
    if (seg.kind === 'override') {
      text += seg.text;
      continue;
    }
    const part = decodeWithCodec(seg.bytes, candidate.name);
    if (!part.ok) return part;
    text += part.text;
  }
  return { ok: true, text };
}
