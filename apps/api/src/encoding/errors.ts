// apps/api/src/encoding/errors.ts

/**
 * Ошибка конфигурации реестра кодировок (неизвестное имя, дубли, пустой список).
 * Бросается только при старте, никогда — при декодировании конкретного буфера.
 */
export class ConfigurationError extends Error {
  readonly encoding?: string;

  constructor(message: string, encoding?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.encoding = encoding;
  }
}
