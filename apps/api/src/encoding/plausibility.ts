// apps/api/src/encoding/plausibility.ts

export const MAX_CONTROL_RATIO = 0.3;

const TAB = 9;
const LF = 10;
const CR = 13;

export function isControlCodePoint(cp: number): boolean {
  return cp < 32 && cp !== TAB && cp !== LF && cp !== CR;
}

/** Похоже ли на текст: доля управляющих символов (кроме \t \n \r) не больше 0.3. */
export function isLikelyText(text: string): boolean {
  if (!text) return true;

  let total = 0;
  let control = 0;
  for (const ch of text) {
    total++;
    if (isControlCodePoint(ch.codePointAt(0) ?? 0)) control++;
  }
  return control / total <= MAX_CONTROL_RATIO;
}
