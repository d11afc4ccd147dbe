/**
 * Fast-check свойства движка декодирования: детерминизм, правдоподобие результата,
 * обратимость для UTF-8 и верность байтам для остальных кодировок.
 */
import fc from 'fast-check';
import iconv from 'iconv-lite';
import { CHARSETS, decodeWithFallback, DEFAULT_CANDIDATES, detectText, isLikelyText } from '../src/encoding';

// символы, которые берутся из charsets.json, а не из таблиц iconv-lite
const overrideChars = (encoding: string): Set<string> => {
  const charset = DEFAULT_CANDIDATES.find(c => c.name === encoding)?.charset;
  return new Set(charset ? CHARSETS[charset].overrides.values() : []);
};

const bytesArb = fc.uint8Array({ maxLength: 64 });

const utf8TextArb = fc
  .array(fc.constantFrom('a', 'Z', '0', ' ', '\n', '\t', '.', 'é', 'ж', '中', 'ｱ', '😀'), { maxLength: 80 })
  .map(chars => chars.join(''));

describe('decode engine fuzz (fast-check)', () => {
  it('is deterministic for arbitrary bytes', () => {
    fc.assert(
      fc.property(bytesArb, (bytes) => {
        expect(detectText(bytes)).toEqual(detectText(bytes));
      }),
      { numRuns: 300 }
    );
  });

  it('only returns text that passes the plausibility filter', () => {
    fc.assert(
      fc.property(bytesArb, (bytes) => {
        const text = decodeWithFallback(bytes);
        if (text !== null) expect(isLikelyText(text)).toBe(true);
      }),
      { numRuns: 300 }
    );
  });

  it('encodes accepted legacy text back to the input bytes', () => {
    const cjkBytesArb = fc.array(
      fc.oneof(fc.integer({ min: 0x20, max: 0x7e }), fc.integer({ min: 0x81, max: 0xfe })),
      { minLength: 1, maxLength: 24 }
    ).map(xs => Uint8Array.from(xs));

    fc.assert(
      fc.property(fc.oneof(bytesArb, cjkBytesArb), (bytes) => {
        const res = detectText(bytes);
        fc.pre(res.kind === 'text' && res.encoding !== 'utf-8');
        if (res.kind !== 'text') return;
        const overrides = overrideChars(res.encoding);
        fc.pre(![...res.text].some(ch => overrides.has(ch)));
        expect(iconv.encode(res.text, res.encoding).equals(Buffer.from(bytes))).toBe(true);
      }),
      { numRuns: 300 }
    );
  });

  it('never modifies its input', () => {
    fc.assert(
      fc.property(bytesArb, (bytes) => {
        const copy = Uint8Array.from(bytes);
        detectText(bytes);
        expect(Buffer.from(bytes).equals(Buffer.from(copy))).toBe(true);
      }),
      { numRuns: 200 }
    );
  });

  it('round-trips printable UTF-8 text through the fast path', () => {
    fc.assert(
      fc.property(utf8TextArb, (text) => {
        const res = detectText(Buffer.from(text, 'utf8'));
        expect(res).toMatchObject({ kind: 'text', encoding: 'utf-8', text });
      }),
      { numRuns: 300 }
    );
  });
});
