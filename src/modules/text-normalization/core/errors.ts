import type { AppError } from '../../../common/types/errors.js';

export interface DictionaryLoadError extends AppError {
  readonly type: 'DictionaryLoadError';
  readonly path: string;
}

export const createDictionaryLoadError = (
  path: string,
  message: string,
  cause?: unknown
): DictionaryLoadError => ({
  type: 'DictionaryLoadError',
  message,
  path,
  ...(cause !== undefined && { cause }),
});
