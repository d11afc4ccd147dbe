// apps/api/src/services/fileView.ts
import { DEFAULT_CANDIDATES, detectText, type EncodingCandidate } from '../encoding';
import { createLogger } from '../lib/logger';

const log = createLogger({ scope: 'svc.fileView' });

export const BINARY_NOT_SUPPORTED = 'Binary files are not supported.';

// байткод показывают дизассемблер/декомпилятор, не этот сервис
const BYTECODE_EXTENSIONS = new Set(['pyc', 'pyo']);

export type FileView =
  | { kind: 'text'; path: string; extension: string; encoding: string | null; text: string }
  | { kind: 'binary'; path: string; extension: string; message: string }
  | { kind: 'bytecode'; path: string; extension: string };

/** Всё после последней точки; без точки — имя целиком (как подсказка для подсветки). */
export function fileExtension(filePath: string): string {
  return filePath.slice(filePath.lastIndexOf('.') + 1);
}

export function viewFile(
  filePath: string,
  contents: Uint8Array | string,
  candidates: readonly EncodingCandidate[] = DEFAULT_CANDIDATES,
): FileView {
  const extension = fileExtension(filePath);

  if (BYTECODE_EXTENSIONS.has(extension)) return { kind: 'bytecode', path: filePath, extension };

  if (typeof contents === 'string') {
    return { kind: 'text', path: filePath, extension, encoding: null, text: contents };
  }

  const res = detectText(contents, candidates);
  if (res.kind === 'binary') {
    log.debug('binary file', 'fileView.binary', { path: filePath, size: contents.length });
    return { kind: 'binary', path: filePath, extension, message: BINARY_NOT_SUPPORTED };
  }

  log.debug('file decoded', 'fileView.decoded', {
    path: filePath, size: contents.length, encoding: res.encoding, tried: res.attempts.length,
  });
  return { kind: 'text', path: filePath, extension, encoding: res.encoding, text: res.text };
}
