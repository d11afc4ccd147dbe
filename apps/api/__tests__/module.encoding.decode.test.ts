import { hex } from '../__mocks__/helpers';
import { decodeWithFallback, detectText, resolveCandidates, type AttemptVerdict } from '../src/encoding';

const trail = (attempts: AttemptVerdict[]) =>
  attempts.map(a => (a.status === 'rejected-script-mismatch' ? `${a.encoding}:${a.check}` : `${a.encoding}:${a.status}`));

describe('decodeWithFallback: encodings detected under the default order', () => {
  it.each([
    ['utf-8', 'Hello, World!', '48656c6c6f2c20576f726c6421'],
    ['cp1252', 'Windows™ text', '57696e646f7773992074657874'],
    ['shift_jis', 'こんにちは世界', '82b182f182c982bf82cd90a28a45'],
    ['euc-kr', '안녕하세요', 'bec8b3e7c7cfbcbcbfe4'],
    ['big5', '繁體中文', 'c163c5e9a4a4a4e5'],
    ['cp1251', 'Привет мир', 'cff0e8e2e5f220ece8f0'],
  ])('%s: %s', (_enc, text, bytes) => {
    expect(decodeWithFallback(hex(bytes))).toBe(text);
  });
});

describe('decodeWithFallback: known misdetections', () => {
  it.each([
    ['gbk', '你好世界', 'c4e3bac3cac0bde7', '콱봤各썹'],
    ['gb2312', '中文测试', 'd6d0cec4b2e2cad4', '櫓匡꿎桿'],
    ['iso-8859-1', 'Héllo Wörld', '48e96c6c6f2057f6726c64', 'Hйllo Wцrld'],
    ['iso-8859-2', 'Cześć świat', '437a65b6e620b677696174', 'Cze¶ж ¶wiat'],
  ])('%s: %s decodes to something else', (_enc, original, bytes, got) => {
    const res = decodeWithFallback(hex(bytes));
    expect(res).toBe(got);
    expect(res).not.toBe(original);
  });
});

describe('decodeWithFallback: cells outside the strict charsets', () => {
  it.each([
    ['shift_jis user-defined area', '6162f1e963', 'cp1251', 'ab\u0441\u0439c'],
    ['lone 0x80', '80313030', 'cp1251', '\u0402100'],
    ['shift_jis NEC row', '874087418742', 'gbk', '嘆嘇嘊'],
    ['big5 text with full-width punctuation', 'a741a66ea141a540acc9a149616263', 'cp1251', '§A¦nЎAҐ@¬ЙЎIabc'],
    ['big5 HKSCS lead byte', 'fa74cde2', 'gbk', '鷗外'],
    ['big5 ETEN kana', 'ba7ea672c6afc6cea5e6c6bcc6eea4e5', 'big5', '漢字かな交じり文'],
  ])('%s', (_name, bytes, encoding, text) => {
    expect(detectText(hex(bytes))).toMatchObject({ kind: 'text', encoding, text });
  });
});

describe('decodeWithFallback: binary data', () => {
  it.each([
    ['random binary with null bytes', 'fffe000001 0203'],
    ['null bytes only', '00'.repeat(10)],
    ['low control characters', '0102030405'],
    ['JPEG header', 'ffd8ffe00010'],
  ])('%s → null', (_name, bytes) => {
    expect(decodeWithFallback(hex(bytes))).toBeNull();
  });
});

describe('detectText', () => {
  it('decodes the empty buffer to the empty string on the fast path', () => {
    expect(detectText(Buffer.alloc(0))).toEqual({
      kind: 'text',
      text: '',
      encoding: 'utf-8',
      attempts: [{ encoding: 'utf-8', status: 'accepted' }],
    });
  });

  it('keeps a UTF-8 BOM in the text', () => {
    expect(decodeWithFallback(hex('efbbbf 6869'))).toBe('\uFEFFhi');
  });

  it('reports cp1251 as the encoding that accepted the cp1252 sample', () => {
    const res = detectText(hex('57696e646f7773992074657874'));
    expect(res.kind === 'text' && res.encoding).toBe('cp1251');
  });

  it('records every attempt up to the accepted one', () => {
    const res = detectText(hex('48e96c6c6f2057f6726c64'));
    expect(trail(res.attempts)).toEqual([
      'utf-8:decode-error',
      'shift_jis:decode-error',
      'euc-kr:decode-error',
      'big5:ascii-cjk-mix',
      'gbk:ascii-cjk-mix',
      'gb2312:decode-error',
      'cp1251:accepted',
    ]);
  });

  it('rejects shift_jis on a half-width katakana flood before trying euc-kr', () => {
    const res = detectText(hex('d6d0cec4b2e2cad4'));
    expect(trail(res.attempts)).toEqual(['utf-8:decode-error', 'shift_jis:katakana-flood', 'euc-kr:accepted']);
  });

  it('rejects big5 bytes under euc-kr by byte grammar', () => {
    const res = detectText(hex('c163c5e9a4a4a4e5'));
    expect(res.attempts[2]).toEqual({ encoding: 'euc-kr', status: 'decode-error', reason: 'bytes outside euc-kr grammar' });
    expect(res.kind === 'text' && res.encoding).toBe('big5');
  });

  it('falls through when UTF-8 is valid but full of control characters', () => {
    const res = detectText(hex('0102030405'));
    expect(res.kind).toBe('binary');
    expect(trail(res.attempts)).toEqual([
      'utf-8:rejected-corrupt',
      'shift_jis:rejected-corrupt',
      'euc-kr:rejected-corrupt',
      'big5:rejected-corrupt',
      'gbk:rejected-corrupt',
      'gb2312:rejected-corrupt',
      'cp1251:rejected-corrupt',
      'iso-8859-2:rejected-corrupt',
      'cp1252:rejected-corrupt',
      'latin-1:rejected-corrupt',
    ]);
  });

  it('returns the same result on repeated calls', () => {
    const buf = hex('c4e3bac3cac0bde7');
    expect(detectText(buf)).toEqual(detectText(buf));
  });

  it('does not modify the input buffer', () => {
    const buf = hex('48e96c6c6f2057f6726c64');
    const copy = Buffer.from(buf);
    detectText(buf);
    expect(buf.equals(copy)).toBe(true);
  });

  it('reads a Uint8Array view at its own offset', () => {
    const backing = Buffer.from('xxHello');
    const view = new Uint8Array(backing.buffer, backing.byteOffset + 2, 5);
    expect(decodeWithFallback(view)).toBe('Hello');
  });
});

describe('candidate order changes outcomes', () => {
  const withFirst = (name: string) =>
    resolveCandidates([name, ...['shift_jis', 'euc-kr', 'big5', 'gbk', 'gb2312', 'cp1251', 'iso-8859-2', 'cp1252', 'latin-1'].filter(n => n !== name)]);

  it.each([
    ['gbk', '你好世界', 'c4e3bac3cac0bde7'],
    ['gb2312', '中文测试', 'd6d0cec4b2e2cad4'],
    ['latin-1', 'Héllo Wörld', '48e96c6c6f2057f6726c64'],
    ['iso-8859-2', 'Cześć świat', '437a65b6e620b677696174'],
  ])('%s first recovers %s', (name, text, bytes) => {
    expect(decodeWithFallback(hex(bytes))).not.toBe(text);
    expect(decodeWithFallback(hex(bytes), withFirst(name))).toBe(text);
  });

  it('returns null when the only candidate cannot decode the bytes', () => {
    expect(decodeWithFallback(hex('ff41'), resolveCandidates(['euc-kr']))).toBeNull();
  });
});
